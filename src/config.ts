import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'

import { ConfigError } from './errors'
import { DEFAULT_BASE_URL } from './llm/client'
import {
  defaultConfigPath,
  defaultSessionsDir,
  defaultSummariesDir,
  resolveUserPath,
} from './sessions/paths'

export const DEFAULT_MODEL = 'openai/gpt-4o-mini'
export const DEFAULT_PROMPT = 'default'
const DEFAULT_MAX_RETRIES = 3
const DEFAULT_TIMEOUT_MS = 60_000

export type RecapConfig = {
  /** Null when no key is configured; generation then fails fast. */
  apiKey: string | null
  baseUrl: string
  sessionsDir: string
  summariesDir: string
  promptDirs: string[]
  model: string
  prompt: string
  referer: string | null
  title: string | null
  maxRetries: number
  timeoutMs: number
  /** The file that was consulted, whether or not it existed. */
  configPath: string
}

export type RecapConfigOverrides = Partial<
  Pick<
    RecapConfig,
    'apiKey' | 'baseUrl' | 'sessionsDir' | 'summariesDir' | 'model' | 'prompt'
  >
>

export type LoadRecapConfigOptions = {
  env?: NodeJS.ProcessEnv
  configPath?: string | null
  overrides?: RecapConfigOverrides
}

const configFileSchema = z.object({
  api_key: z.string().min(1).optional(),
  base_url: z.string().url().optional(),
  sessions_dir: z.string().min(1).optional(),
  summaries_dir: z.string().min(1).optional(),
  prompt_dirs: z.array(z.string().min(1)).optional(),
  model: z.string().min(1).optional(),
  prompt: z.string().min(1).optional(),
  referer: z.string().min(1).optional(),
  title: z.string().min(1).optional(),
  max_retries: z.number().int().min(0).optional(),
  timeout_ms: z.number().int().positive().optional(),
})

export type RecapConfigFile = z.infer<typeof configFileSchema>

function readConfigFile(configPath: string): RecapConfigFile {
  if (!existsSync(configPath)) {
    return {}
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Invalid YAML in ${configPath}: ${message}`, {
      cause: error,
    })
  }
  if (raw === null || raw === undefined) {
    return {}
  }

  const parsed = configFileSchema.safeParse(raw)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; ')
    throw new ConfigError(`Invalid config in ${configPath}: ${details}`)
  }
  return parsed.data
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined
}

/**
 * Layered configuration: defaults, then the YAML file, then environment
 * variables, then explicit overrides (CLI flags).
 */
export function loadRecapConfig(
  options: LoadRecapConfigOptions = {},
): RecapConfig {
  const env = options.env ?? process.env
  const configPath = options.configPath
    ? resolveUserPath(options.configPath)
    : defaultConfigPath(env)
  const file = readConfigFile(configPath)
  const overrides = options.overrides ?? {}

  const sessionsDir =
    overrides.sessionsDir ?? file.sessions_dir ?? defaultSessionsDir()
  const summariesDir =
    overrides.summariesDir ?? file.summaries_dir ?? defaultSummariesDir(env)

  return {
    apiKey:
      overrides.apiKey ??
      nonEmpty(env.OPENROUTER_API_KEY) ??
      file.api_key ??
      null,
    baseUrl:
      overrides.baseUrl ??
      nonEmpty(env.OPENROUTER_BASE_URL) ??
      file.base_url ??
      DEFAULT_BASE_URL,
    sessionsDir: resolveUserPath(sessionsDir),
    summariesDir: resolveUserPath(summariesDir),
    promptDirs: (file.prompt_dirs ?? []).map((dir) => resolveUserPath(dir)),
    model: overrides.model ?? file.model ?? DEFAULT_MODEL,
    prompt: overrides.prompt ?? file.prompt ?? DEFAULT_PROMPT,
    referer: file.referer ?? null,
    title: file.title ?? null,
    maxRetries: file.max_retries ?? DEFAULT_MAX_RETRIES,
    timeoutMs: file.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    configPath,
  }
}
