import {
  isJsonObject,
  parseJsonValue,
  type JsonObject,
  type JsonValue,
} from '../utils/json-value'
import { silentLogger } from '../utils/logger'
import {
  AuthenticationError,
  ClientConfigurationError,
  OpenRouterError,
  RateLimitError,
  TransientError,
} from './errors'
import { ModelCatalogCache } from './model-catalog'
import type {
  ChatMessage,
  CompleteOptions,
  CompletionClientConfig,
  CompletionRequest,
  CompletionResult,
  CompletionUsage,
  CostEstimate,
  FetchLike,
  ModelCatalog,
} from './types'

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1'
const DEFAULT_TIMEOUT_MS = 60_000
const DEFAULT_MAX_RETRIES = 3
const DEFAULT_TEMPERATURE = 0.2
const RETRY_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504])
const MAX_BACKOFF_BASE_SECONDS = 16
const MIN_BACKOFF_SECONDS = 0.5

/**
 * CompletionClient talks to an OpenRouter-compatible API. Transport, retry
 * and error classification are hidden behind it.
 */
export type CompletionClient = {
  readonly baseUrl: string
  readonly maxRetries: number
  readonly catalogCache: ModelCatalogCache
  complete(
    request: CompletionRequest,
    messages: ChatMessage[],
    options?: CompleteOptions,
  ): Promise<CompletionResult>
  /** Model metadata by id; refetched when older than an hour or forced. */
  modelCatalog(forceRefresh?: boolean): Promise<ModelCatalog>
  /** USD estimate from catalog pricing, or null when it cannot be computed. */
  estimateCost(
    model: string,
    usage: CompletionUsage,
  ): Promise<CostEstimate | null>
}

type HttpMethod = 'GET' | 'POST'

type RawResponse = {
  status: number
  /** Seconds from the `Retry-After` header, 0 when absent. */
  retryAfter: number
  text: string
}

class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms.`)
    this.name = 'RequestTimeoutError'
  }
}

export function createCompletionClient(
  config: CompletionClientConfig,
): CompletionClient {
  if (!config.apiKey) {
    throw new AuthenticationError('OpenRouter API key is required')
  }

  const baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const maxRetries = Math.max(0, config.maxRetries ?? DEFAULT_MAX_RETRIES)
  const fetchImpl: FetchLike =
    config.fetch ?? ((url, init) => globalThis.fetch(url, init))
  const sleep = config.sleep ?? defaultSleep
  const random = config.random ?? Math.random
  const now = config.now ?? Date.now
  const logger = config.logger ?? silentLogger
  const catalogCache = new ModelCatalogCache({
    filePath: config.modelCachePath,
    logger,
  })

  const headers: Record<string, string> = {
    Authorization: `Bearer ${config.apiKey}`,
    'Content-Type': 'application/json',
  }
  if (config.referer) headers['HTTP-Referer'] = config.referer
  if (config.title) headers['X-Title'] = config.title

  /**
   * One attempt: the request and the whole body read share a single
   * `timeoutMs` budget. Failures reading the body count as transport errors.
   */
  async function sendOnce(
    method: HttpMethod,
    path: string,
    body?: Record<string, unknown>,
  ): Promise<RawResponse> {
    const controller = new AbortController()
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(new RequestTimeoutError(timeoutMs))
      }, timeoutMs)
    })

    const exchange = async (): Promise<RawResponse> => {
      const response = await fetchImpl(`${baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      })
      const text = await response.text()
      return {
        status: response.status,
        retryAfter: parseRetryAfter(response),
        text,
      }
    }

    try {
      return await Promise.race([exchange(), timeout])
    } catch (error) {
      if (controller.signal.aborted) {
        throw new RequestTimeoutError(timeoutMs)
      }
      throw error
    } finally {
      clearTimeout(timer)
    }
  }

  function backoffSeconds(attempt: number, retryAfter = 0): number {
    const base = Math.min(2 ** attempt, MAX_BACKOFF_BASE_SECONDS)
    const jitter = 0.5 + random()
    return Math.max(MIN_BACKOFF_SECONDS, base * jitter + retryAfter)
  }

  async function requestWithRetries(
    method: HttpMethod,
    path: string,
    body?: Record<string, unknown>,
  ): Promise<JsonObject> {
    let lastError: unknown = null

    for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
      let response: RawResponse
      try {
        response = await sendOnce(method, path, body)
      } catch (error) {
        lastError = error
        logger.debug('remote-transport-error', {
          method,
          path,
          attempt,
          error: error instanceof Error ? error.message : String(error),
        })
        if (attempt < maxRetries) {
          await sleep(backoffSeconds(attempt) * 1000)
        }
        continue
      }

      const status = response.status
      if (status === 401) {
        throw new AuthenticationError('OpenRouter rejected the API key (401)', { status })
      }
      if (status === 403) {
        throw new AuthenticationError('OpenRouter denied access (403)', { status })
      }

      if (RETRY_STATUS_CODES.has(status) && attempt < maxRetries) {
        const delaySeconds = backoffSeconds(attempt, response.retryAfter)
        logger.debug('remote-retry', { method, path, attempt, status, delaySeconds })
        await sleep(delaySeconds * 1000)
        continue
      }

      if (status >= 400) {
        throw classifyErrorResponse(status, response.text)
      }
      return parseJsonObject(response.text)
    }

    if (lastError instanceof RequestTimeoutError) {
      throw new TransientError('OpenRouter request timed out after retries', {
        cause: lastError,
      })
    }
    throw new TransientError('OpenRouter request failed after retries', {
      cause: lastError,
    })
  }

  async function complete(
    request: CompletionRequest,
    messages: ChatMessage[],
    options: CompleteOptions = {},
  ): Promise<CompletionResult> {
    const payload: Record<string, unknown> = {
      model: request.model,
      messages,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    }
    if (options.maxTokens !== undefined && options.maxTokens !== null) {
      payload.max_tokens = options.maxTokens
    }
    if (options.reasoning) {
      payload.reasoning = { ...options.reasoning }
    } else if (request.reasoningEffort) {
      payload.reasoning = { effort: request.reasoningEffort }
    }
    if (options.extraPayload) {
      Object.assign(payload, options.extraPayload)
    }

    const data = await requestWithRetries('POST', '/chat/completions', payload)
    return parseChatCompletion(data)
  }

  async function modelCatalog(forceRefresh = false): Promise<ModelCatalog> {
    if (!forceRefresh) {
      const cached = catalogCache.get(now())
      if (cached) return cached
    }
    return catalogCache.refresh(now(), async () => {
      const data = await requestWithRetries('GET', '/models')
      const models = data.data
      if (!Array.isArray(models)) {
        throw new ClientConfigurationError(
          'OpenRouter models endpoint returned unexpected payload',
        )
      }
      return models
    })
  }

  async function estimateCost(
    model: string,
    usage: CompletionUsage,
  ): Promise<CostEstimate | null> {
    const catalog = await modelCatalog()
    const info = catalog.get(model)
    if (!info) return null
    const pricing = info.pricing
    if (!isJsonObject(pricing)) return null
    return computeCost(pricing, usage)
  }

  return {
    baseUrl,
    maxRetries,
    catalogCache,
    complete,
    modelCatalog,
    estimateCost,
  }
}

export function computeCost(
  pricing: Record<string, unknown>,
  usage: CompletionUsage,
): CostEstimate | null {
  const prompt = costComponent(pricing.prompt, usage.prompt_tokens)
  const completion = costComponent(pricing.completion, usage.completion_tokens)
  if (prompt === null && completion === null) return null

  const estimate: CostEstimate = { total: 0 }
  let total = 0
  if (prompt !== null) {
    estimate.prompt = prompt
    total += prompt
  }
  if (completion !== null) {
    estimate.completion = completion
    total += completion
  }
  estimate.total = round6(total)
  return estimate
}

/** Price is USD per 1000 tokens. */
function costComponent(pricePer1k: unknown, tokens: unknown): number | null {
  const price = toFiniteNumber(pricePer1k)
  const count = toFiniteNumber(tokens)
  if (price === null || count === null) return null
  return round6((price / 1000) * count)
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

function round6(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000
}

export function parseRetryAfter(response: Response): number {
  const header = response.headers.get('Retry-After')
  if (!header || !header.trim()) return 0
  const seconds = Number(header)
  return Number.isFinite(seconds) ? seconds : 0
}

function classifyErrorResponse(status: number, text: string): OpenRouterError {
  const message = extractErrorMessage(text)
  if (status === 429) {
    return new RateLimitError(message ?? 'OpenRouter rate limit exceeded (429)', { status })
  }
  if (status >= 500) {
    return new TransientError(message ?? `OpenRouter server error (${status})`, { status })
  }
  return new OpenRouterError(message ?? `OpenRouter request failed (${status})`, { status })
}

function extractErrorMessage(text: string): string | null {
  const body = parseJsonValue(text)
  if (isJsonObject(body)) {
    const error = body.error
    if (isJsonObject(error) && typeof error.message === 'string' && error.message) {
      return error.message
    }
    return null
  }
  return text.trim() ? text : null
}

function parseJsonObject(text: string): JsonObject {
  const data = parseJsonValue(text)
  if (data === undefined) {
    throw new ClientConfigurationError('OpenRouter returned a non-JSON response')
  }
  if (!isJsonObject(data)) {
    throw new ClientConfigurationError('OpenRouter response was not a JSON object')
  }
  return data
}

function parseChatCompletion(data: JsonObject): CompletionResult {
  const choices = data.choices
  if (!Array.isArray(choices) || choices.length === 0) {
    throw new ClientConfigurationError('OpenRouter chat response missing choices')
  }

  const firstChoice = choices[0]
  const message = isJsonObject(firstChoice) ? firstChoice.message : undefined
  if (!isJsonObject(firstChoice) || !isJsonObject(message)) {
    throw new ClientConfigurationError('OpenRouter chat response missing message content')
  }

  const content = message.content
  if (typeof content !== 'string') {
    throw new ClientConfigurationError('OpenRouter chat response missing text content')
  }

  const usage: CompletionUsage = isJsonObject(data.usage) ? data.usage : {}
  const reasoning = firstTruthy(message.reasoning, firstChoice.reasoning, data.reasoning)
  const finishReason = firstChoice.finish_reason

  return {
    content,
    usage,
    reasoning: isJsonObject(reasoning) ? reasoning : null,
    finishReason: typeof finishReason === 'string' ? finishReason : null,
    raw: data,
  }
}

function firstTruthy(
  ...values: (JsonValue | undefined)[]
): JsonValue | undefined {
  return values.find((value) => Boolean(value))
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
