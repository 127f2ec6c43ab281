import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { homedir, tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { DEFAULT_MODEL, loadRecapConfig } from '../src/config'
import { ConfigError } from '../src/errors'
import { DEFAULT_BASE_URL } from '../src/llm/client'

let root: string

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'recap-config-'))
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
})

function writeConfig(content: string): string {
  const path = join(root, 'config.yml')
  writeFileSync(path, content, 'utf-8')
  return path
}

describe('loadRecapConfig', () => {
  test('uses defaults when no config file exists', () => {
    const config = loadRecapConfig({
      env: { XDG_CONFIG_HOME: join(root, 'config'), XDG_DATA_HOME: join(root, 'data') },
    })

    expect(config).toEqual({
      apiKey: null,
      baseUrl: DEFAULT_BASE_URL,
      sessionsDir: join(homedir(), '.codex', 'sessions'),
      summariesDir: join(root, 'data', 'session-recap', 'summaries'),
      promptDirs: [],
      model: DEFAULT_MODEL,
      prompt: 'default',
      referer: null,
      title: null,
      maxRetries: 3,
      timeoutMs: 60_000,
      configPath: join(root, 'config', 'session-recap', 'config.yml'),
    })
  })

  test('reads values from the YAML file', () => {
    const configPath = writeConfig(
      [
        'api_key: file-key',
        'base_url: https://proxy.test/v1',
        `sessions_dir: ${join(root, 'sessions')}`,
        `summaries_dir: ${join(root, 'summaries')}`,
        'prompt_dirs:',
        '  - ~/prompts',
        'model: vendor/model-x',
        'prompt: brief',
        'title: Recap',
        'max_retries: 1',
        'timeout_ms: 5000',
      ].join('\n'),
    )

    const config = loadRecapConfig({ env: {}, configPath })

    expect(config.apiKey).toBe('file-key')
    expect(config.baseUrl).toBe('https://proxy.test/v1')
    expect(config.sessionsDir).toBe(join(root, 'sessions'))
    expect(config.summariesDir).toBe(join(root, 'summaries'))
    expect(config.promptDirs).toEqual([join(homedir(), 'prompts')])
    expect(config.model).toBe('vendor/model-x')
    expect(config.prompt).toBe('brief')
    expect(config.title).toBe('Recap')
    expect(config.referer).toBeNull()
    expect(config.maxRetries).toBe(1)
    expect(config.timeoutMs).toBe(5000)
  })

  test('environment overrides the file and overrides beat both', () => {
    const configPath = writeConfig('api_key: file-key\nmodel: file-model\n')

    const config = loadRecapConfig({
      env: { OPENROUTER_API_KEY: 'env-key', OPENROUTER_BASE_URL: 'https://env.test/v1' },
      configPath,
      overrides: { model: 'flag-model', sessionsDir: join(root, 'flag-sessions') },
    })

    expect(config.apiKey).toBe('env-key')
    expect(config.baseUrl).toBe('https://env.test/v1')
    expect(config.model).toBe('flag-model')
    expect(config.sessionsDir).toBe(join(root, 'flag-sessions'))
  })

  test('ignores blank environment values', () => {
    const configPath = writeConfig('api_key: file-key\n')
    const config = loadRecapConfig({ env: { OPENROUTER_API_KEY: '  ' }, configPath })
    expect(config.apiKey).toBe('file-key')
  })

  test('finds the file through SESSION_RECAP_CONFIG', () => {
    const configPath = writeConfig('prompt: brief\n')
    const config = loadRecapConfig({ env: { SESSION_RECAP_CONFIG: configPath } })

    expect(config.configPath).toBe(configPath)
    expect(config.prompt).toBe('brief')
  })

  test('treats an empty file as defaults', () => {
    const config = loadRecapConfig({ env: {}, configPath: writeConfig('') })
    expect(config.model).toBe(DEFAULT_MODEL)
  })

  test('raises ConfigError for malformed YAML', () => {
    const configPath = writeConfig('model: [unclosed\n')
    expect(() => loadRecapConfig({ env: {}, configPath })).toThrow(ConfigError)
  })

  test('raises ConfigError naming the invalid key', () => {
    const configPath = writeConfig('max_retries: -1\n')
    expect(() => loadRecapConfig({ env: {}, configPath })).toThrow(/max_retries/)
  })

  test('raises ConfigError when the file is not a mapping', () => {
    const configPath = writeConfig('- just\n- a list\n')
    expect(() => loadRecapConfig({ env: {}, configPath })).toThrow(ConfigError)
  })
})
