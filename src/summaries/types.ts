export type SummaryMetadata = Record<string, unknown>

export type SummaryRequest = {
  readonly sessionPath: string
  readonly promptVariant: string
  readonly model: string
  /** Explicit template file; takes precedence over `promptVariant` lookup. */
  readonly promptPath: string | null
  /** Sent as `reasoning.effort`; null leaves reasoning out of the payload. */
  readonly reasoningEffort: string | null
  readonly refresh: boolean
  /** Display hint: print the body without its front matter. */
  readonly stripMetadata: boolean
}

export type SummaryRequestInput = Pick<
  SummaryRequest,
  'sessionPath' | 'promptVariant' | 'model'
> &
  Partial<
    Pick<
      SummaryRequest,
      'promptPath' | 'reasoningEffort' | 'refresh' | 'stripMetadata'
    >
  >

export const DEFAULT_REASONING_EFFORT = 'medium'

export function createSummaryRequest(
  input: SummaryRequestInput,
): SummaryRequest {
  return Object.freeze({
    sessionPath: input.sessionPath,
    promptVariant: input.promptVariant,
    model: input.model,
    promptPath: input.promptPath ?? null,
    reasoningEffort:
      input.reasoningEffort === undefined
        ? DEFAULT_REASONING_EFFORT
        : input.reasoningEffort,
    refresh: input.refresh ?? false,
    stripMetadata: input.stripMetadata ?? false,
  })
}

export type SummaryRecord = {
  body: string
  cachePath: string
  metadata: SummaryMetadata
  /** True when served from disk, false when freshly generated. */
  cached: boolean
}

export type SummaryLookup =
  | { status: 'found'; record: SummaryRecord }
  | { status: 'not_found'; cachePath: string }
