import { createHash } from 'node:crypto'
import { existsSync, readdirSync } from 'node:fs'
import { basename, extname, isAbsolute, join, relative, sep } from 'node:path'

import { resolveUserPath } from '../sessions/paths'

export const SUMMARY_FILENAME = 'summary.md'
export const SUMMARY_MESSAGES_FILENAME = 'summary.messages.jsonl'
export const MODEL_CATALOG_FILENAME = '_model_catalog.json'
const EXTERNAL_DIR = 'external'
const DIGEST_LENGTH = 12

export function slugify(value: string): string {
  const slug = value
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '')
  return slug || 'default'
}

/**
 * Decides where summaries live:
 * `<summaryRoot>/<session dir>/<prompt slug>/summary.md`.
 *
 * The model is accepted but does not take part in the path, so every model
 * shares one slot per prompt variant.
 */
export class SummaryPathResolver {
  readonly summaryRoot: string
  readonly sessionsRoot: string | null

  constructor(summaryRoot: string, sessionsRoot?: string | null) {
    this.summaryRoot = resolveUserPath(summaryRoot)
    this.sessionsRoot = sessionsRoot ? resolveUserPath(sessionsRoot) : null
  }

  cachePathFor(sessionPath: string, promptVariant: string, _model?: string): string {
    return join(this.summaryDirFor(sessionPath), slugify(promptVariant), SUMMARY_FILENAME)
  }

  summaryDirFor(sessionPath: string): string {
    return join(this.summaryRoot, this.relativeSourceDir(resolveUserPath(sessionPath)))
  }

  messagesPathFor(sessionPath: string): string {
    return join(this.summaryDirFor(sessionPath), SUMMARY_MESSAGES_FILENAME)
  }

  modelCatalogPath(): string {
    return join(this.summaryRoot, MODEL_CATALOG_FILENAME)
  }

  /** Cached prompt variants for a session, keyed by slug, ordered by name. */
  cachedVariantsFor(sessionPath: string): Map<string, string> {
    const summaryDir = this.summaryDirFor(sessionPath)
    const variants = new Map<string, string>()
    if (!existsSync(summaryDir)) return variants

    const children = readdirSync(summaryDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
    for (const name of children) {
      const summaryPath = join(summaryDir, name, SUMMARY_FILENAME)
      if (existsSync(summaryPath)) {
        variants.set(name, summaryPath)
      }
    }
    return variants
  }

  private relativeSourceDir(sessionPath: string): string {
    if (this.sessionsRoot) {
      const rel = relative(this.sessionsRoot, sessionPath)
      const outside = rel === '..' || rel.startsWith(`..${sep}`)
      if (rel && !outside && !isAbsolute(rel)) {
        return rel
      }
    }
    const digest = createHash('sha1')
      .update(sessionPath)
      .digest('hex')
      .slice(0, DIGEST_LENGTH)
    const stem = basename(sessionPath, extname(sessionPath))
    return join(EXTERNAL_DIR, `${digest}-${slugify(stem)}`)
  }
}
