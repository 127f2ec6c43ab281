import { existsSync } from 'node:fs'
import { basename, extname, join } from 'node:path'
import { Command } from 'commander'

import { OutputExistsError, SessionNotFoundError } from '../../errors'
import {
  describeSessions,
  resolveSessionPath,
  type SessionEntry,
} from '../../sessions/list'
import { iterMessages, writeMessagesJsonl } from '../../sessions/messages'
import { resolveUserPath } from '../../sessions/paths'
import { loadCliContext, type CliDependencies } from '../context'
import { getGlobalOptions, runCommand } from '../io'
import { parseOptionalPositiveInteger } from './shared'

const DEFAULT_LIST_LIMIT = 20

type ListOptions = {
  limit?: string
}

type ExtractOptions = {
  output?: string
  outputDir?: string
  stdout?: boolean
  force?: boolean
}

export type ExtractResult = {
  sessionPath: string
  outputPath: string | null
  count: number
}

export function defaultExtractFileName(sessionPath: string): string {
  return `${basename(sessionPath, extname(sessionPath))}.messages.jsonl`
}

export function formatSessionTable(entries: SessionEntry[]): string[] {
  const rows = entries.map((entry) => ({
    prefix: `${String(entry.index).padStart(3)}. ${entry.displayPath}`,
    size: entry.sizeBytes.toLocaleString('en-US').replace(/,/g, ' '),
    cwd: entry.cwd ?? '?',
  }))
  const prefixWidth = Math.max(...rows.map((row) => row.prefix.length))
  const sizeWidth = Math.max(...rows.map((row) => row.size.length))
  return rows.map(
    (row) =>
      `${row.prefix.padEnd(prefixWidth)}  ${row.size.padStart(sizeWidth)} B  cwd: ${row.cwd}`,
  )
}

export function createListCommand(deps: CliDependencies = {}): Command {
  return new Command('list')
    .description('List recent session JSONL files')
    .option('--limit <limit>', `Limit number of entries (default: ${DEFAULT_LIST_LIMIT})`)
    .action(async (options: ListOptions, command: Command) => {
      await runCommand(
        command,
        async () => {
          const { config } = loadCliContext(command, deps)
          const limit = parseOptionalPositiveInteger(
            options.limit,
            DEFAULT_LIST_LIMIT,
            'Limit must be a positive integer.',
          )
          if (!existsSync(config.sessionsDir)) {
            throw new SessionNotFoundError(
              `Sessions dir does not exist: ${config.sessionsDir}`,
              ['Pass --sessions-dir or set sessions_dir in the config file.'],
            )
          }
          const sessions = await describeSessions(config.sessionsDir, limit)
          return { sessionsDir: config.sessionsDir, sessions }
        },
        ({ sessionsDir, sessions }) => {
          if (sessions.length === 0) {
            console.log(`No session files found under ${sessionsDir}`)
            return
          }
          console.log(`Sessions under ${sessionsDir}`)
          for (const line of formatSessionTable(sessions)) {
            console.log(line)
          }
        },
      )
    })
}

export function createExtractCommand(deps: CliDependencies = {}): Command {
  return new Command('extract')
    .description("Extract only 'type=message' lines to a JSONL file")
    .argument('<session>', 'Index, path or file name of the session JSONL')
    .option('-o, --output <file>', 'Output file for the extracted messages')
    .option('--output-dir <dir>', 'Directory for <session>.messages.jsonl (default: cwd)')
    .option('--stdout', 'Write to stdout instead of a file')
    .option('-f, --force', 'Overwrite output if it exists')
    .action(async (session: string, options: ExtractOptions, command: Command) => {
      await runCommand(
        command,
        async (): Promise<ExtractResult> => {
          if (options.output && options.outputDir) {
            throw new Error('Specify either --output or --output-dir, not both.')
          }
          if (options.stdout && getGlobalOptions(command).json) {
            throw new Error('--stdout writes JSON lines and cannot be combined with --json.')
          }
          const { config } = loadCliContext(command, deps)
          const sessionPath = await resolveSessionPath(session, config.sessionsDir)

          if (options.stdout) {
            let count = 0
            for await (const message of iterMessages(sessionPath)) {
              process.stdout.write(`${JSON.stringify(message)}\n`)
              count += 1
            }
            return { sessionPath, outputPath: null, count }
          }

          const outputPath = options.output
            ? resolveUserPath(options.output)
            : join(
                options.outputDir ? resolveUserPath(options.outputDir) : process.cwd(),
                defaultExtractFileName(sessionPath),
              )
          if (existsSync(outputPath) && !options.force) {
            throw new OutputExistsError(outputPath)
          }
          const count = await writeMessagesJsonl(sessionPath, outputPath)
          return { sessionPath, outputPath, count }
        },
        ({ outputPath, count }) => {
          if (outputPath) {
            console.log(`Wrote ${count} message lines to ${outputPath}`)
          }
        },
      )
    })
}
