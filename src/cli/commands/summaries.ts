import { Command } from 'commander'

import { GenerationCancelledError } from '../../errors'
import { resolveSessionPath } from '../../sessions/list'
import { GenerationSlot } from '../../summaries/generation-slot'
import { renderSummary } from '../../summaries/storage'
import { createSummaryRequest, type SummaryRecord } from '../../summaries/types'
import { buildSummaryService, loadCliContext, type CliDependencies } from '../context'
import { runCommand } from '../io'
import { parseOptionalNumber, parseOptionalPositiveInteger } from './shared'

type SummarizeOptions = {
  prompt?: string
  model?: string
  reasoningEffort?: string
  refresh?: boolean
  cache: boolean
  stripMetadata?: boolean
  maxTokens?: string
  temperature?: string
}

/** `none` drops the reasoning block from the request. */
function parseReasoningEffort(value: string | undefined): string | null | undefined {
  if (value === undefined) return undefined
  return value === 'none' ? null : value
}

export function createSummarizeCommand(deps: CliDependencies = {}): Command {
  return new Command('summarize')
    .description('Summarize a session, reusing the cached summary when present')
    .argument('<session>', 'Index, path or file name of the session JSONL')
    .option('-p, --prompt <prompt>', 'Prompt variant name or template path')
    .option('-m, --model <model>', 'Model id to request')
    .option('--reasoning-effort <effort>', "Reasoning effort, or 'none' (default: medium)")
    .option('--refresh', 'Regenerate and re-extract even when cached')
    .option('--no-cache', 'Skip the cache lookup but still write the result')
    .option('--strip-metadata', 'Print the summary without front matter')
    .option('--max-tokens <count>', 'Maximum completion tokens')
    .option('--temperature <value>', 'Sampling temperature (default: 0.2)')
    .action(async (session: string, options: SummarizeOptions, command: Command) => {
      await runCommand(
        command,
        async (): Promise<SummaryRecord> => {
          const maxTokens = parseOptionalPositiveInteger(
            options.maxTokens,
            null,
            'Max tokens must be a positive integer.',
          )
          const temperature = parseOptionalNumber(
            options.temperature,
            'Temperature must be a number.',
          )
          const context = loadCliContext(command, deps)
          const { config } = context
          const sessionPath = await resolveSessionPath(session, config.sessionsDir)
          const prompt = options.prompt ?? config.prompt
          const looksLikePath = prompt.includes('/') || prompt.endsWith('.md') || prompt.endsWith('.txt')
          const request = createSummaryRequest({
            sessionPath,
            promptVariant: prompt,
            model: options.model ?? config.model,
            promptPath: looksLikePath ? prompt : null,
            reasoningEffort: parseReasoningEffort(options.reasoningEffort),
            refresh: Boolean(options.refresh),
            stripMetadata: Boolean(options.stripMetadata),
          })
          const service = buildSummaryService(context, deps)

          const slot = new GenerationSlot<SummaryRecord>()
          const task = slot.start(() =>
            service.generate(request, {
              useCache: options.cache,
              maxTokens,
              temperature,
            }),
          )
          const onSigint = (): void => {
            task.cancel()
          }
          process.once('SIGINT', onSigint)
          try {
            const outcome = await task.outcome
            if (outcome.status === 'cancelled') {
              throw new GenerationCancelledError()
            }
            if (outcome.status === 'failed') {
              throw outcome.error
            }
            return outcome.value
          } finally {
            process.removeListener('SIGINT', onSigint)
          }
        },
        (record) => {
          process.stdout.write(
            renderSummary(record, { stripMetadata: Boolean(options.stripMetadata) }),
          )
        },
      )
    })
}

export function createVariantsCommand(deps: CliDependencies = {}): Command {
  return new Command('variants')
    .description('List cached prompt variants for a session')
    .argument('<session>', 'Index, path or file name of the session JSONL')
    .action(async (session: string, _options: unknown, command: Command) => {
      await runCommand(
        command,
        async () => {
          const context = loadCliContext(command, deps)
          const sessionPath = await resolveSessionPath(session, context.config.sessionsDir)
          const variants = buildSummaryService(context, deps).cachedVariants(sessionPath)
          return {
            sessionPath,
            variants: Array.from(variants, ([name, path]) => ({ name, path })),
          }
        },
        ({ sessionPath, variants }) => {
          if (variants.length === 0) {
            console.log(`No cached summaries for ${sessionPath}`)
            return
          }
          for (const variant of variants) {
            console.log(`${variant.name}  ${variant.path}`)
          }
        },
      )
    })
}
