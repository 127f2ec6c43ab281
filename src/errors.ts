export type RecapErrorCode =
  | 'REMOTE_ERROR'
  | 'AUTHENTICATION_FAILED'
  | 'RATE_LIMITED'
  | 'TRANSIENT_FAILURE'
  | 'CLIENT_CONFIGURATION'
  | 'PROMPT_INVALID'
  | 'PROMPT_NOT_FOUND'
  | 'SUMMARY_FORMAT'
  | 'CLIENT_REQUIRED'
  | 'SESSION_NOT_FOUND'
  | 'SESSION_AMBIGUOUS'
  | 'OUTPUT_EXISTS'
  | 'CONFIG_INVALID'
  | 'GENERATION_IN_PROGRESS'
  | 'GENERATION_CANCELLED'

/**
 * Base error for everything the library raises on purpose. The CLI renders
 * `code` and `suggestions` in --json mode.
 */
export class RecapError extends Error {
  readonly code: RecapErrorCode
  readonly suggestions?: string[]

  constructor(
    code: RecapErrorCode,
    message: string,
    suggestions?: string[],
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'RecapError'
    this.code = code
    this.suggestions = suggestions
  }
}

export function isRecapError(error: unknown): error is RecapError {
  return error instanceof RecapError
}

export class PromptValidationError extends RecapError {
  constructor(message: string) {
    super('PROMPT_INVALID', message)
    this.name = 'PromptValidationError'
  }
}

export class PromptNotFoundError extends RecapError {
  constructor(message: string, suggestions?: string[]) {
    super('PROMPT_NOT_FOUND', message, suggestions)
    this.name = 'PromptNotFoundError'
  }
}

export class SummaryFormatError extends RecapError {
  constructor(message: string) {
    super('SUMMARY_FORMAT', message)
    this.name = 'SummaryFormatError'
  }
}

export class SummaryClientRequiredError extends RecapError {
  constructor() {
    super(
      'CLIENT_REQUIRED',
      'Summary service requires a completion client to generate summaries.',
      ['Set OPENROUTER_API_KEY or add api_key to the config file.'],
    )
    this.name = 'SummaryClientRequiredError'
  }
}

export class SessionNotFoundError extends RecapError {
  constructor(message: string, suggestions?: string[]) {
    super('SESSION_NOT_FOUND', message, suggestions)
    this.name = 'SessionNotFoundError'
  }
}

export class AmbiguousSessionError extends RecapError {
  readonly matches: string[]

  constructor(candidate: string, matches: string[]) {
    super(
      'SESSION_AMBIGUOUS',
      `Ambiguous filename '${candidate}' matched ${matches.length} files. Please provide a full path.`,
      matches,
    )
    this.name = 'AmbiguousSessionError'
    this.matches = matches
  }
}

export class OutputExistsError extends RecapError {
  constructor(filePath: string) {
    super(
      'OUTPUT_EXISTS',
      `Refusing to overwrite existing file: ${filePath}. Use --force to overwrite or specify --output.`,
    )
    this.name = 'OutputExistsError'
  }
}

export class ConfigError extends RecapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, undefined, options)
    this.name = 'ConfigError'
  }
}

export class GenerationInProgressError extends RecapError {
  constructor() {
    super(
      'GENERATION_IN_PROGRESS',
      'A summary generation is already in progress.',
    )
    this.name = 'GenerationInProgressError'
  }
}

export class GenerationCancelledError extends RecapError {
  constructor() {
    super('GENERATION_CANCELLED', 'Summary generation cancelled.')
    this.name = 'GenerationCancelledError'
  }
}
