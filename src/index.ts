export * from './errors'
export * from './llm'
export * from './summaries'

export type {
  LoadRecapConfigOptions,
  RecapConfig,
  RecapConfigFile,
  RecapConfigOverrides,
} from './config'
export { DEFAULT_MODEL, DEFAULT_PROMPT, loadRecapConfig } from './config'

export type { SessionEntry, SessionFile } from './sessions/list'
export {
  describeSessions,
  extractCwdFromSession,
  extractCwdFromText,
  listSessions,
  resolveSessionPath,
} from './sessions/list'
export type { TranscriptMessage } from './sessions/messages'
export {
  extractMessage,
  iterJsonl,
  iterMessages,
  readMessages,
  writeMessagesJsonl,
} from './sessions/messages'
export {
  defaultConfigPath,
  defaultSessionsDir,
  defaultSummariesDir,
  expandHome,
  resolveUserPath,
} from './sessions/paths'

export type { JsonArray, JsonObject, JsonPrimitive, JsonValue, JsonVisitor } from './utils/json-value'
export { findInJson, isJsonObject, parseJsonValue, visitJson } from './utils/json-value'
export type { ConsoleLoggerOptions, Logger } from './utils/logger'
export { createConsoleLogger, silentLogger } from './utils/logger'
