import { homedir } from 'node:os'
import { isAbsolute, join, resolve } from 'node:path'

const APP_DIR = 'session-recap'

export function expandHome(value: string): string {
  if (value === '~') return homedir()
  if (value.startsWith('~/')) return join(homedir(), value.slice(2))
  return value
}

/** Expand `~` and resolve against the working directory. */
export function resolveUserPath(value: string, cwd = process.cwd()): string {
  const expanded = expandHome(value)
  return isAbsolute(expanded) ? resolve(expanded) : resolve(cwd, expanded)
}

export function defaultSessionsDir(): string {
  return join(homedir(), '.codex', 'sessions')
}

export function defaultSummariesDir(
  env: NodeJS.ProcessEnv = process.env,
): string {
  const dataHome = env.XDG_DATA_HOME
  return join(
    dataHome ?? join(homedir(), '.local', 'share'),
    APP_DIR,
    'summaries',
  )
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SESSION_RECAP_CONFIG) {
    return resolveUserPath(env.SESSION_RECAP_CONFIG)
  }
  const configHome = env.XDG_CONFIG_HOME
  return join(configHome ?? join(homedir(), '.config'), APP_DIR, 'config.yml')
}
