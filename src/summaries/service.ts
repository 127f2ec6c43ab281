import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'

import { SummaryClientRequiredError } from '../errors'
import type { CompletionClient } from '../llm/client'
import type { ChatMessage, CompletionResult } from '../llm/types'
import { writeMessagesJsonl } from '../sessions/messages'
import { resolveUserPath } from '../sessions/paths'
import { silentLogger, type Logger } from '../utils/logger'
import { SummaryPathResolver } from './paths'
import { PromptLoader } from './prompts'
import { lookupSummary, writeSummary } from './storage'
import type {
  SummaryLookup,
  SummaryMetadata,
  SummaryRecord,
  SummaryRequest,
} from './types'

export type SummaryServiceOptions = {
  summaryRoot: string
  sessionsRoot?: string | null
  client?: CompletionClient | null
  prompts?: PromptLoader
  resolver?: SummaryPathResolver
  logger?: Logger
}

export type GenerateOptions = {
  useCache?: boolean
  /** Defaults to `request.refresh`. */
  refresh?: boolean
  /** Replaces the default system + transcript messages. */
  messages?: ChatMessage[]
  extraPayload?: Record<string, unknown>
  temperature?: number
  maxTokens?: number | null
}

export type SummaryPaths = {
  cachePath: string
  messagesPath: string
}

export type SummaryService = {
  readonly resolver: SummaryPathResolver
  generate(
    request: SummaryRequest,
    options?: GenerateOptions,
  ): Promise<SummaryRecord>
  lookup(request: SummaryRequest): Promise<SummaryLookup>
  /** Existing cache entry or null; never generates. */
  getCachedSummary(request: SummaryRequest): Promise<SummaryRecord | null>
  cachedVariants(sessionPath: string): Map<string, string>
  pathsFor(request: SummaryRequest): SummaryPaths
}

export function buildTranscriptBlock(transcript: string): string {
  const body = transcript.replace(/\n+$/, '')
  return ['<session start>', '"""', body, '"""', '</session end>'].join('\n')
}

/**
 * Facade used by the CLI: serves a summary from the cache when it can and
 * otherwise extracts the transcript, calls the model and persists the result.
 */
export function createSummaryService(
  options: SummaryServiceOptions,
): SummaryService {
  const resolver =
    options.resolver ??
    new SummaryPathResolver(options.summaryRoot, options.sessionsRoot)
  const prompts = options.prompts ?? new PromptLoader()
  const client = options.client ?? null
  const logger = options.logger ?? silentLogger

  function pathsFor(request: SummaryRequest): SummaryPaths {
    return {
      cachePath: resolver.cachePathFor(
        request.sessionPath,
        request.promptVariant,
        request.model,
      ),
      messagesPath: resolver.messagesPathFor(request.sessionPath),
    }
  }

  async function ensureMessagesFile(
    sessionPath: string,
    messagesPath: string,
    refresh: boolean,
  ): Promise<number | null> {
    if (refresh || !existsSync(messagesPath)) {
      return writeMessagesJsonl(sessionPath, messagesPath)
    }
    return null
  }

  async function defaultMessages(
    promptContent: string,
    messagesPath: string,
  ): Promise<ChatMessage[]> {
    const transcript = await readFile(messagesPath, 'utf-8')
    return [
      { role: 'system', content: promptContent.trim() || promptContent },
      { role: 'user', content: buildTranscriptBlock(transcript) },
    ]
  }

  async function buildMetadata(
    request: SummaryRequest,
    promptPath: string,
    messagesPath: string,
    messageCount: number | null,
    result: CompletionResult,
    activeClient: CompletionClient,
  ): Promise<SummaryMetadata> {
    const metadata: SummaryMetadata = {
      model: request.model,
      prompt_variant: request.promptVariant,
      prompt_path: promptPath,
      source_path: resolveUserPath(request.sessionPath),
      usage: { ...result.usage },
      messages_path: messagesPath,
    }
    if (messageCount !== null) {
      metadata.message_count = messageCount
    }
    try {
      const cost = await activeClient.estimateCost(request.model, result.usage)
      if (cost) metadata.cost_estimate_usd = cost
    } catch (error) {
      logger.debug('cost-estimate-failed', {
        model: request.model,
        error: error instanceof Error ? error.message : String(error),
      })
    }
    if (result.reasoning) metadata.reasoning = result.reasoning
    if (result.finishReason) metadata.finish_reason = result.finishReason
    metadata.raw_response = result.raw
    return metadata
  }

  function logEvent(
    event: string,
    request: SummaryRequest,
    extra: Record<string, unknown>,
  ): void {
    logger.debug('summary-service', {
      summary: {
        event,
        session_path: request.sessionPath,
        prompt_variant: request.promptVariant,
        model: request.model,
        ...extra,
      },
    })
  }

  async function generate(
    request: SummaryRequest,
    generateOptions: GenerateOptions = {},
  ): Promise<SummaryRecord> {
    const useCache = generateOptions.useCache ?? true
    const refresh = generateOptions.refresh ?? request.refresh
    const sessionPath = resolveUserPath(request.sessionPath)
    const { cachePath, messagesPath } = pathsFor(request)

    if (useCache && !refresh) {
      const lookup = await lookupSummary(cachePath)
      if (lookup.status === 'found') {
        const record = lookup.record
        const messageCount = await ensureMessagesFile(sessionPath, messagesPath, false)
        if (record.metadata.messages_path === undefined) {
          record.metadata.messages_path = messagesPath
        }
        if (messageCount !== null && record.metadata.message_count === undefined) {
          record.metadata.message_count = messageCount
        }
        logEvent('cache-hit', request, { cache_path: cachePath, messages_path: messagesPath })
        return { ...record, cached: true }
      }
    }

    if (!client) {
      throw new SummaryClientRequiredError()
    }
    const prompt = prompts.load(request.promptPath ?? request.promptVariant)
    const messageCount = await ensureMessagesFile(sessionPath, messagesPath, refresh)
    const messages =
      generateOptions.messages ?? (await defaultMessages(prompt.content, messagesPath))

    const result = await client.complete(request, messages, {
      temperature: generateOptions.temperature,
      maxTokens: generateOptions.maxTokens,
      extraPayload: generateOptions.extraPayload,
    })

    const metadata = await buildMetadata(
      request,
      prompt.path,
      messagesPath,
      messageCount,
      result,
      client,
    )
    const record = await writeSummary(cachePath, result.content, metadata)
    logEvent('cache-miss', request, {
      cache_path: cachePath,
      messages_path: messagesPath,
      cost: metadata.cost_estimate_usd ?? {},
    })
    return { ...record, cached: false }
  }

  async function lookup(request: SummaryRequest): Promise<SummaryLookup> {
    return lookupSummary(pathsFor(request).cachePath)
  }

  async function getCachedSummary(
    request: SummaryRequest,
  ): Promise<SummaryRecord | null> {
    const result = await lookup(request)
    return result.status === 'found' ? result.record : null
  }

  return {
    resolver,
    generate,
    lookup,
    getCachedSummary,
    cachedVariants: (sessionPath) => resolver.cachedVariantsFor(sessionPath),
    pathsFor,
  }
}
