import type { Command } from 'commander'
import { GenerationCancelledError, isRecapError } from '../errors'

export type GlobalCliOptions = {
  json: boolean
  quiet: boolean
  verbose: boolean
  config?: string
  sessionsDir?: string
  summariesDir?: string
}

type JsonSuccess<T> = {
  ok: true
  data: T
  meta: { cwd: string; durationMs: number }
}

type JsonError = {
  ok: false
  error: { code: string; message: string; suggestions?: string[] }
  meta: { cwd: string; durationMs: number }
}

export function getGlobalOptions(command: Command): GlobalCliOptions {
  let root: Command = command
  while (root.parent) {
    root = root.parent
  }
  const options = root.opts<{
    json?: boolean
    quiet?: boolean
    verbose?: boolean
    config?: string
    sessionsDir?: string
    summariesDir?: string
  }>()
  return {
    json: Boolean(options.json),
    quiet: Boolean(options.quiet),
    verbose: Boolean(options.verbose),
    config: options.config,
    sessionsDir: options.sessionsDir,
    summariesDir: options.summariesDir,
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof GenerationCancelledError ? 130 : 1
}

export async function runCommand<T>(
  command: Command,
  executor: () => Promise<T>,
  render: (data: T) => void,
): Promise<void> {
  const options = getGlobalOptions(command)
  const startedAt = Date.now()
  try {
    const data = await executor()
    if (options.json) {
      const payload: JsonSuccess<T> = {
        ok: true,
        data,
        meta: { cwd: process.cwd(), durationMs: Date.now() - startedAt },
      }
      console.log(JSON.stringify(payload, null, 2))
      return
    }
    if (!options.quiet) {
      render(data)
    }
  } catch (error) {
    if (options.json) {
      const payload: JsonError = {
        ok: false,
        error: formatError(error),
        meta: { cwd: process.cwd(), durationMs: Date.now() - startedAt },
      }
      console.log(JSON.stringify(payload, null, 2))
      process.exitCode = exitCodeFor(error)
      return
    }
    throw error
  }
}

export function formatError(error: unknown): JsonError['error'] {
  if (isRecapError(error)) {
    return {
      code: error.code,
      message: error.message,
      suggestions: error.suggestions,
    }
  }
  const message = error instanceof Error ? error.message : String(error)
  return { code: 'UNKNOWN_ERROR', message }
}
