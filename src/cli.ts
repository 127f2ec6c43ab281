import { Command } from 'commander'

import type { CliDependencies } from './cli/context'
import { createExtractCommand, createListCommand } from './cli/commands/sessions'
import { createSummarizeCommand, createVariantsCommand } from './cli/commands/summaries'

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command('session-recap')
    .description('List agent sessions, extract their messages and summarize them')
    .option('--sessions-dir <dir>', 'Directory containing session JSONL files (default: ~/.codex/sessions)')
    .option('--summaries-dir <dir>', 'Directory for cached summaries')
    .option('--config <file>', 'Config file (default: ~/.config/session-recap/config.yml)')
    .option('--json', 'Output JSON envelopes')
    .option('--quiet', 'Suppress normal output')
    .option('--verbose', 'Log debug events to stderr')

  program.action(() => {
    program.outputHelp()
  })

  program.addCommand(createListCommand(deps))
  program.addCommand(createExtractCommand(deps))
  program.addCommand(createSummarizeCommand(deps))
  program.addCommand(createVariantsCommand(deps))
  return program
}

export async function main(
  argv: string[] = process.argv,
  deps: CliDependencies = {},
): Promise<void> {
  await createProgram(deps).parseAsync(argv)
}
