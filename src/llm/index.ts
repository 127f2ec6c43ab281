export type {
  ChatMessage,
  ChatRole,
  CompleteOptions,
  CompletionClientConfig,
  CompletionRequest,
  CompletionResult,
  CompletionUsage,
  CostEstimate,
  FetchLike,
  ModelCatalog,
  ModelInfo,
} from './types'

export type { CompletionClient } from './client'
export {
  computeCost,
  createCompletionClient,
  DEFAULT_BASE_URL,
  parseRetryAfter,
} from './client'

export {
  indexModels,
  ModelCatalogCache,
  MODEL_CATALOG_TTL_MS,
} from './model-catalog'

export {
  AuthenticationError,
  ClientConfigurationError,
  OpenRouterError,
  RateLimitError,
  TransientError,
} from './errors'
