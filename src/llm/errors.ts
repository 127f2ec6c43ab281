import { RecapError, type RecapErrorCode } from '../errors'

type RemoteErrorOptions = {
  status?: number
  cause?: unknown
}

/** Base error for failures talking to the completion API. */
export class OpenRouterError extends RecapError {
  readonly status?: number

  constructor(
    message: string,
    options: RemoteErrorOptions = {},
    code: RecapErrorCode = 'REMOTE_ERROR',
  ) {
    super(code, message, undefined, { cause: options.cause })
    this.name = 'OpenRouterError'
    this.status = options.status
  }
}

/** Missing or rejected API key (401/403). Never retried. */
export class AuthenticationError extends OpenRouterError {
  constructor(message: string, options: RemoteErrorOptions = {}) {
    super(message, options, 'AUTHENTICATION_FAILED')
    this.name = 'AuthenticationError'
  }
}

/** HTTP 429 after retries were exhausted. */
export class RateLimitError extends OpenRouterError {
  constructor(message: string, options: RemoteErrorOptions = {}) {
    super(message, options, 'RATE_LIMITED')
    this.name = 'RateLimitError'
  }
}

/** 5xx or transport failure after retries were exhausted. */
export class TransientError extends OpenRouterError {
  constructor(message: string, options: RemoteErrorOptions = {}) {
    super(message, options, 'TRANSIENT_FAILURE')
    this.name = 'TransientError'
  }
}

/** The API answered with a payload this client does not understand. */
export class ClientConfigurationError extends OpenRouterError {
  constructor(message: string, options: RemoteErrorOptions = {}) {
    super(message, options, 'CLIENT_CONFIGURATION')
    this.name = 'ClientConfigurationError'
  }
}
