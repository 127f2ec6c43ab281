import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { z } from 'zod'

import { isJsonObject } from '../utils/json-value'
import { silentLogger, type Logger } from '../utils/logger'
import type { ModelCatalog, ModelInfo } from './types'

export const MODEL_CATALOG_TTL_MS = 60 * 60 * 1000

const persistedCatalogSchema = z.object({
  timestamp: z.string().min(1),
  data: z.array(z.unknown()),
})

export type ModelCatalogCacheOptions = {
  filePath?: string | null
  ttlMs?: number
  logger?: Logger
}

export function indexModels(models: unknown[]): Map<string, ModelInfo> {
  const indexed = new Map<string, ModelInfo>()
  for (const model of models) {
    if (!isJsonObject(model)) continue
    const id = model.id
    if (typeof id !== 'string' || !id) continue
    indexed.set(id, { ...model, id })
  }
  return indexed
}

/**
 * Pricing metadata keyed by model id, fresh for one hour. The disk copy is a
 * side channel: failing to read or write it only costs a refetch.
 */
export class ModelCatalogCache {
  private models: Map<string, ModelInfo> | null = null
  private fetchedAtMs: number | null = null
  private readonly filePath: string | null
  private readonly ttlMs: number
  private readonly logger: Logger

  constructor(options: ModelCatalogCacheOptions = {}) {
    this.filePath = options.filePath ?? null
    this.ttlMs = options.ttlMs ?? MODEL_CATALOG_TTL_MS
    this.logger = options.logger ?? silentLogger
    if (this.filePath && existsSync(this.filePath)) {
      this.loadFromDisk(this.filePath)
    }
  }

  get timestampMs(): number | null {
    return this.fetchedAtMs
  }

  /** The cached catalog when it is fresh at `now`, else null. */
  get(now: number): ModelCatalog | null {
    if (!this.models || this.models.size === 0 || this.fetchedAtMs === null) {
      return null
    }
    if (now - this.fetchedAtMs >= this.ttlMs) {
      return null
    }
    return this.models
  }

  async refresh(
    now: number,
    fetchModels: () => Promise<unknown[]>,
  ): Promise<ModelCatalog> {
    const models = await fetchModels()
    const indexed = indexModels(models)
    this.models = indexed
    this.fetchedAtMs = now
    this.persist(now, models)
    return indexed
  }

  private loadFromDisk(filePath: string): void {
    let raw: unknown
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'))
    } catch (error) {
      this.logger.debug('model-catalog-load-failed', {
        path: filePath,
        error: error instanceof Error ? error.message : String(error),
      })
      return
    }

    const parsed = persistedCatalogSchema.safeParse(raw)
    if (!parsed.success) {
      this.logger.debug('model-catalog-invalid', { path: filePath })
      return
    }
    const timestamp = Date.parse(parsed.data.timestamp)
    if (Number.isNaN(timestamp)) {
      this.logger.debug('model-catalog-invalid', { path: filePath })
      return
    }

    const indexed = indexModels(parsed.data.data)
    if (indexed.size > 0) {
      this.models = indexed
      this.fetchedAtMs = timestamp
    }
  }

  private persist(now: number, models: unknown[]): void {
    if (!this.filePath) return
    try {
      mkdirSync(dirname(this.filePath), { recursive: true })
      writeFileSync(
        this.filePath,
        `${JSON.stringify({ timestamp: new Date(now).toISOString(), data: models }, null, 2)}\n`,
        'utf-8',
      )
    } catch (error) {
      this.logger.debug('model-catalog-write-failed', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }
}
