import type { JsonObject } from '../utils/json-value'
import type { Logger } from '../utils/logger'

export type ChatRole = 'system' | 'user' | 'assistant'

export type ChatMessage = {
  role: ChatRole
  content: string
}

/** The parts of a summary request the client reads. */
export type CompletionRequest = {
  model: string
  reasoningEffort?: string | null
}

export type CompletionUsage = Record<string, unknown>

export type CompletionResult = {
  content: string
  usage: CompletionUsage
  /** Reasoning trace when the provider returns one. */
  reasoning: JsonObject | null
  finishReason: string | null
  raw: JsonObject
}

export type CompleteOptions = {
  temperature?: number
  maxTokens?: number | null
  /** Sent as-is; overrides the request's reasoning effort. */
  reasoning?: Record<string, unknown> | null
  /** Merged into the payload last, so any field can be overridden. */
  extraPayload?: Record<string, unknown> | null
}

export type ModelInfo = JsonObject & { id: string }

export type ModelCatalog = ReadonlyMap<string, ModelInfo>

export type CostEstimate = {
  prompt?: number
  completion?: number
  total: number
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export type CompletionClientConfig = {
  apiKey: string
  /** Default: https://openrouter.ai/api/v1 */
  baseUrl?: string
  /** Sent as HTTP-Referer */
  referer?: string | null
  /** Sent as X-Title */
  title?: string | null
  /** Per-attempt timeout in milliseconds (default: 60000) */
  timeoutMs?: number
  /** Extra attempts after the first (default: 3) */
  maxRetries?: number
  /** Where the pricing catalog is persisted; omitted means memory only. */
  modelCachePath?: string | null
  fetch?: FetchLike
  sleep?: (ms: number) => Promise<void>
  /** Uniform [0, 1) source used for backoff jitter. */
  random?: () => number
  now?: () => number
  logger?: Logger
}
