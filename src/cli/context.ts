import type { Command } from 'commander'

import { loadRecapConfig, type RecapConfig } from '../config'
import { createCompletionClient } from '../llm/client'
import type { FetchLike } from '../llm/types'
import { PromptLoader } from '../summaries/prompts'
import { SummaryPathResolver } from '../summaries/paths'
import { createSummaryService, type SummaryService } from '../summaries/service'
import { createConsoleLogger, type Logger } from '../utils/logger'
import { getGlobalOptions } from './io'

export type CliContext = {
  config: RecapConfig
  logger: Logger
}

export type CliDependencies = {
  env?: NodeJS.ProcessEnv
  /** Replaces global fetch for the completion client. */
  fetch?: FetchLike
}

export function loadCliContext(
  command: Command,
  deps: CliDependencies = {},
): CliContext {
  const options = getGlobalOptions(command)
  const config = loadRecapConfig({
    env: deps.env,
    configPath: options.config,
    overrides: {
      sessionsDir: options.sessionsDir,
      summariesDir: options.summariesDir,
    },
  })
  return { config, logger: createConsoleLogger({ verbose: options.verbose }) }
}

/**
 * Build the orchestrator for a command. Without an API key the service still
 * serves cached summaries and fails only when it would have to generate.
 */
export function buildSummaryService(
  context: CliContext,
  deps: CliDependencies = {},
): SummaryService {
  const { config, logger } = context
  const resolver = new SummaryPathResolver(config.summariesDir, config.sessionsDir)
  const [promptsDir, ...extraSearchDirs] = config.promptDirs
  const client = config.apiKey
    ? createCompletionClient({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        referer: config.referer ?? undefined,
        title: config.title ?? undefined,
        timeoutMs: config.timeoutMs,
        maxRetries: config.maxRetries,
        modelCachePath: resolver.modelCatalogPath(),
        fetch: deps.fetch,
        logger,
      })
    : null
  return createSummaryService({
    summaryRoot: config.summariesDir,
    sessionsRoot: config.sessionsDir,
    client,
    prompts: new PromptLoader({ promptsDir, extraSearchDirs }),
    resolver,
    logger,
  })
}
