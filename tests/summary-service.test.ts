import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import { SummaryClientRequiredError } from '../src/errors'
import { createCompletionClient, type CompletionClient } from '../src/llm/client'
import { ModelCatalogCache } from '../src/llm/model-catalog'
import type { ChatMessage, CompletionResult, FetchLike } from '../src/llm/types'
import { BUILTIN_PROMPTS_DIR } from '../src/summaries/prompts'
import { buildTranscriptBlock, createSummaryService } from '../src/summaries/service'
import { writeSummary } from '../src/summaries/storage'
import { createSummaryRequest } from '../src/summaries/types'
import type { Logger } from '../src/utils/logger'

const TRANSCRIPT = [
  '{"type":"message","role":"user","content":"fix the build"}',
  'garbage line',
  '{"type":"message","role":"assistant","content":"done"}',
  '{"payload":{"type":"message","role":"user","content":"thanks"}}',
  '{"oops"',
].join('\n')

const EXTRACTED = [
  '{"type":"message","role":"user","content":"fix the build"}',
  '{"type":"message","role":"assistant","content":"done"}',
  '{"type":"message","role":"user","content":"thanks"}',
]

let root: string
let sessionsRoot: string
let summaryRoot: string
let sessionPath: string

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'recap-service-'))
  sessionsRoot = join(root, 'sessions')
  summaryRoot = join(root, 'summaries')
  mkdirSync(join(sessionsRoot, '2026'), { recursive: true })
  sessionPath = join(sessionsRoot, '2026', 's.jsonl')
  writeFileSync(sessionPath, TRANSCRIPT, 'utf-8')
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
})

type FakeClient = CompletionClient & { received: ChatMessage[][] }

function makeFakeClient(
  result: Partial<CompletionResult> = {},
  estimateCost: CompletionClient['estimateCost'] = async () => null,
): FakeClient {
  const received: ChatMessage[][] = []
  return {
    baseUrl: 'https://example.test',
    maxRetries: 0,
    catalogCache: new ModelCatalogCache(),
    received,
    complete: async (_request, messages) => {
      received.push(messages)
      return {
        content: 'Fresh summary',
        usage: { prompt_tokens: 40, completion_tokens: 8 },
        reasoning: null,
        finishReason: 'stop',
        raw: { id: 'gen-1' },
        ...result,
      }
    },
    modelCatalog: async () => new Map(),
    estimateCost,
  }
}

function request(overrides: { refresh?: boolean } = {}) {
  return createSummaryRequest({
    sessionPath,
    promptVariant: 'default',
    model: 'test-model',
    ...overrides,
  })
}

function expectedCachePath(): string {
  return join(summaryRoot, '2026', 's.jsonl', 'default', 'summary.md')
}

function expectedMessagesPath(): string {
  return join(summaryRoot, '2026', 's.jsonl', 'summary.messages.jsonl')
}

describe('buildTranscriptBlock', () => {
  test('wraps the transcript without its trailing newlines', () => {
    expect(buildTranscriptBlock('a\nb\n\n')).toBe(
      '<session start>\n"""\na\nb\n"""\n</session end>',
    )
  })
})

describe('createSummaryService', () => {
  test('serves a cached summary without calling the client', async () => {
    const client = makeFakeClient()
    const complete = vi.spyOn(client, 'complete')
    const service = createSummaryService({ summaryRoot, sessionsRoot, client })
    await writeSummary(expectedCachePath(), 'Cached body', { model: 'test-model' })

    const record = await service.generate(request())

    expect(complete).not.toHaveBeenCalled()
    expect(record.cached).toBe(true)
    expect(record.cachePath).toBe(expectedCachePath())
    expect(record.body).toBe('Cached body\n')
    expect(record.metadata).toEqual({
      model: 'test-model',
      messages_path: expectedMessagesPath(),
      message_count: 3,
    })
    expect(readFileSync(expectedMessagesPath(), 'utf-8')).toBe(`${EXTRACTED.join('\n')}\n`)
  })

  test('serves cache hits even without a client', async () => {
    const service = createSummaryService({ summaryRoot, sessionsRoot })
    await writeSummary(expectedCachePath(), 'Cached body', { model: 'test-model' })

    const record = await service.generate(request())
    expect(record.cached).toBe(true)
  })

  test('requires a client on a cache miss', async () => {
    const service = createSummaryService({ summaryRoot, sessionsRoot })

    await expect(service.generate(request())).rejects.toBeInstanceOf(SummaryClientRequiredError)
    expect(existsSync(expectedCachePath())).toBe(false)
  })

  test('refresh rewrites the extracted log and calls the client once', async () => {
    const client = makeFakeClient()
    const service = createSummaryService({ summaryRoot, sessionsRoot, client })
    await writeSummary(expectedCachePath(), 'Old body', { model: 'test-model' })
    writeFileSync(expectedMessagesPath(), 'stale\n', 'utf-8')

    const record = await service.generate(request({ refresh: true }))

    expect(client.received).toHaveLength(1)
    expect(record.cached).toBe(false)
    expect(record.body).toBe('Fresh summary\n')
    expect(record.metadata.message_count).toBe(3)
    expect(readFileSync(expectedMessagesPath(), 'utf-8')).toBe(`${EXTRACTED.join('\n')}\n`)
  })

  test('useCache false regenerates but keeps an existing extracted log', async () => {
    const client = makeFakeClient()
    const service = createSummaryService({ summaryRoot, sessionsRoot, client })
    await writeSummary(expectedCachePath(), 'Old body', { model: 'test-model' })
    mkdirSync(join(summaryRoot, '2026', 's.jsonl'), { recursive: true })
    writeFileSync(expectedMessagesPath(), '{"type":"message","content":"kept"}\n', 'utf-8')

    const record = await service.generate(request(), { useCache: false })

    expect(record.cached).toBe(false)
    expect(record.metadata.message_count).toBeUndefined()
    expect(client.received[0][1].content).toBe(
      '<session start>\n"""\n{"type":"message","content":"kept"}\n"""\n</session end>',
    )
  })

  test('sends the prompt as system message and the transcript as user message', async () => {
    const client = makeFakeClient()
    const service = createSummaryService({ summaryRoot, sessionsRoot, client })

    await service.generate(request())

    const prompt = readFileSync(join(BUILTIN_PROMPTS_DIR, 'default.md'), 'utf-8')
    expect(client.received[0]).toEqual([
      { role: 'system', content: prompt.trim() },
      {
        role: 'user',
        content: `<session start>\n"""\n${EXTRACTED.join('\n')}\n"""\n</session end>`,
      },
    ])
  })

  test('leaves no extracted log behind when the session cannot be read', async () => {
    rmSync(sessionPath)
    const client = makeFakeClient()
    const service = createSummaryService({ summaryRoot, sessionsRoot, client })

    await expect(service.generate(request())).rejects.toMatchObject({ code: 'ENOENT' })
    expect(existsSync(expectedMessagesPath())).toBe(false)
    expect(client.received).toEqual([])

    writeFileSync(sessionPath, TRANSCRIPT, 'utf-8')
    await service.generate(request())

    expect(client.received[0][1]).toEqual({
      role: 'user',
      content: `<session start>\n"""\n${EXTRACTED.join('\n')}\n"""\n</session end>`,
    })
  })

  test('records generation metadata in the front matter', async () => {
    const client = makeFakeClient({ reasoning: { summary: 'short trace' } }, async () => ({
      prompt: 0.01,
      completion: 0.02,
      total: 0.03,
    }))
    const service = createSummaryService({ summaryRoot, sessionsRoot, client })

    const record = await service.generate(request())

    expect(record.metadata).toEqual({
      model: 'test-model',
      prompt_variant: 'default',
      prompt_path: join(BUILTIN_PROMPTS_DIR, 'default.md'),
      source_path: sessionPath,
      usage: { prompt_tokens: 40, completion_tokens: 8 },
      messages_path: expectedMessagesPath(),
      message_count: 3,
      cost_estimate_usd: { prompt: 0.01, completion: 0.02, total: 0.03 },
      reasoning: { summary: 'short trace' },
      finish_reason: 'stop',
      raw_response: { id: 'gen-1' },
    })
    const reloaded = await service.getCachedSummary(request())
    expect(reloaded?.metadata).toEqual(record.metadata)
  })

  test('logs and omits a failed cost estimate', async () => {
    const debug = vi.fn<Logger['debug']>()
    const client = makeFakeClient({}, async () => {
      throw new Error('catalog offline')
    })
    const service = createSummaryService({
      summaryRoot,
      sessionsRoot,
      client,
      logger: { debug },
    })

    const record = await service.generate(request())

    expect(record.metadata.cost_estimate_usd).toBeUndefined()
    expect(debug).toHaveBeenCalledWith('cost-estimate-failed', {
      model: 'test-model',
      error: 'catalog offline',
    })
  })

  test('lookup distinguishes found and not found', async () => {
    const service = createSummaryService({ summaryRoot, sessionsRoot })

    expect(await service.lookup(request())).toEqual({
      status: 'not_found',
      cachePath: expectedCachePath(),
    })
    expect(await service.getCachedSummary(request())).toBeNull()

    await writeSummary(expectedCachePath(), 'Body', {})
    const found = await service.lookup(request())
    expect(found.status).toBe('found')
  })

  test('lists cached variants for a session', async () => {
    const service = createSummaryService({ summaryRoot, sessionsRoot, client: makeFakeClient() })
    await service.generate(request())

    expect(Array.from(service.cachedVariants(sessionPath).keys())).toEqual(['default'])
  })
})

describe('end to end with the HTTP client', () => {
  test('second run is served from the first run cache entry', async () => {
    const fetch = vi.fn<FetchLike>(async (url) => {
      if (url.endsWith('/models')) {
        return new Response(
          JSON.stringify({
            data: [{ id: 'test-model', pricing: { prompt: '1', completion: '2' } }],
          }),
          { status: 200 },
        )
      }
      return new Response(
        JSON.stringify({
          choices: [{ message: { content: 'Generated summary' }, finish_reason: 'stop' }],
          usage: { prompt_tokens: 100, completion_tokens: 50 },
        }),
        { status: 200 },
      )
    })
    const client = createCompletionClient({
      apiKey: 'test-key',
      baseUrl: 'https://example.test/v1',
      fetch,
      sleep: async () => {},
    })
    const service = createSummaryService({ summaryRoot, sessionsRoot, client })

    const first = await service.generate(request())
    expect(first.cached).toBe(false)
    expect(first.metadata.cost_estimate_usd).toEqual({ prompt: 0.1, completion: 0.1, total: 0.2 })
    expect(readFileSync(expectedMessagesPath(), 'utf-8').trimEnd().split('\n')).toHaveLength(3)
    const callsAfterFirst = fetch.mock.calls.length

    const second = await service.generate(request())
    expect(second.cached).toBe(true)
    expect(second.cachePath).toBe(first.cachePath)
    expect(second.body).toBe('Generated summary\n')
    expect(fetch.mock.calls.length).toBe(callsAfterFirst)
  })
})
