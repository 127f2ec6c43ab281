export type {
  SummaryLookup,
  SummaryMetadata,
  SummaryRecord,
  SummaryRequest,
  SummaryRequestInput,
} from './types'
export { createSummaryRequest, DEFAULT_REASONING_EFFORT } from './types'

export {
  MODEL_CATALOG_FILENAME,
  slugify,
  SUMMARY_FILENAME,
  SUMMARY_MESSAGES_FILENAME,
  SummaryPathResolver,
} from './paths'

export type { SummaryDocument } from './storage'
export {
  loadSummary,
  lookupSummary,
  renderSummary,
  splitSummaryDocument,
  writeSummary,
} from './storage'

export type { PromptDocument } from './prompts'
export { BUILTIN_PROMPTS_DIR, PromptLoader, validatePrompt } from './prompts'

export type {
  GenerateOptions,
  SummaryPaths,
  SummaryService,
  SummaryServiceOptions,
} from './service'
export { buildTranscriptBlock, createSummaryService } from './service'

export type { GenerationOutcome, GenerationTask } from './generation-slot'
export { GenerationSlot } from './generation-slot'
