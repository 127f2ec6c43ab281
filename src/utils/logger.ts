export type Logger = {
  debug(event: string, payload?: Record<string, unknown>): void
}

export type ConsoleLoggerOptions = {
  /** Emit debug events. */
  verbose?: boolean
}

/**
 * Debug events go to stderr as one JSON object per line so they never mix
 * with command output on stdout.
 */
export function createConsoleLogger(
  options: ConsoleLoggerOptions = {},
): Logger {
  const verbose = options.verbose ?? false
  return {
    debug(event, payload = {}) {
      if (!verbose) return
      console.error(
        JSON.stringify({
          level: 'debug',
          at: new Date().toISOString(),
          event,
          ...payload,
        }),
      )
    },
  }
}

export const silentLogger: Logger = {
  debug() {},
}
