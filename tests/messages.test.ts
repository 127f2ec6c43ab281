import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import {
  extractMessage,
  iterJsonl,
  readMessages,
  writeMessagesJsonl,
} from '../src/sessions/messages'

const TRANSCRIPT = [
  '{"type":"message","role":"user","content":[{"type":"input_text","text":"hello"}]}',
  'not json {',
  '{"timestamp":"2026-01-01T00:00:00Z","id":"resp-1","payload":{"type":"message","role":"assistant","content":"hi"}}',
  '{"type":"event","name":"tool"}',
  '',
  '{"broken":',
  '{"timestamp":"outer","payload":{"type":"message","role":"user","content":"again","timestamp":"keep"}}',
].join('\n')

let root: string

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'recap-messages-'))
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
})

describe('extractMessage', () => {
  test('returns top-level message records unchanged', () => {
    const record = { type: 'message', role: 'user', content: 'x' }
    expect(extractMessage(record)).toBe(record)
  })

  test('promotes payload messages with outer timestamp and id', () => {
    expect(
      extractMessage({
        timestamp: 't1',
        id: 'resp-9',
        payload: { type: 'message', role: 'assistant', content: 'ok' },
      }),
    ).toEqual({
      type: 'message',
      role: 'assistant',
      content: 'ok',
      timestamp: 't1',
      response_id: 'resp-9',
    })
  })

  test('does not overwrite fields the payload already has', () => {
    expect(
      extractMessage({
        timestamp: 'outer',
        id: 'outer-id',
        payload: { type: 'message', timestamp: 'inner', response_id: 'inner-id' },
      }),
    ).toEqual({ type: 'message', timestamp: 'inner', response_id: 'inner-id' })
  })

  test('ignores non-message records', () => {
    expect(extractMessage({ type: 'event' })).toBeNull()
    expect(extractMessage({ payload: { type: 'function_call' } })).toBeNull()
    expect(extractMessage(['message'])).toBeNull()
    expect(extractMessage('message')).toBeNull()
  })
})

describe('transcript reading', () => {
  test('iterJsonl skips blank and malformed lines', async () => {
    const path = join(root, 'session.jsonl')
    writeFileSync(path, TRANSCRIPT, 'utf-8')

    const values: unknown[] = []
    for await (const value of iterJsonl(path)) values.push(value)
    expect(values).toHaveLength(4)
  })

  test('readMessages returns only message lines', async () => {
    const path = join(root, 'session.jsonl')
    writeFileSync(path, TRANSCRIPT, 'utf-8')

    const messages = await readMessages(path)
    expect(messages.map((message) => message.role)).toEqual(['user', 'assistant', 'user'])
  })

  test('writeMessagesJsonl writes one line per message', async () => {
    const source = join(root, 'session.jsonl')
    const target = join(root, 'out', 'session.messages.jsonl')
    writeFileSync(source, TRANSCRIPT, 'utf-8')

    const count = await writeMessagesJsonl(source, target)
    expect(count).toBe(3)
    expect(readFileSync(target, 'utf-8').split('\n')).toEqual([
      '{"type":"message","role":"user","content":[{"type":"input_text","text":"hello"}]}',
      '{"type":"message","role":"assistant","content":"hi","timestamp":"2026-01-01T00:00:00Z","response_id":"resp-1"}',
      '{"type":"message","role":"user","content":"again","timestamp":"keep"}',
      '',
    ])
  })

  test('writeMessagesJsonl overwrites an existing target', async () => {
    const source = join(root, 'session.jsonl')
    const target = join(root, 'session.messages.jsonl')
    writeFileSync(source, '{"type":"message","content":"only"}\n', 'utf-8')
    writeFileSync(target, 'stale\nstale\nstale\n', 'utf-8')

    expect(await writeMessagesJsonl(source, target)).toBe(1)
    expect(readFileSync(target, 'utf-8')).toBe('{"type":"message","content":"only"}\n')
  })

  test('writeMessagesJsonl keeps the previous target when the source is missing', async () => {
    const target = join(root, 'session.messages.jsonl')
    writeFileSync(target, 'previous\n', 'utf-8')

    await expect(writeMessagesJsonl(join(root, 'absent.jsonl'), target)).rejects.toMatchObject({
      code: 'ENOENT',
    })
    expect(readFileSync(target, 'utf-8')).toBe('previous\n')
    expect(readdirSync(root)).toEqual(['session.messages.jsonl'])
  })

  test('writeMessagesJsonl creates nothing when the source is missing', async () => {
    const target = join(root, 'out', 'session.messages.jsonl')

    await expect(writeMessagesJsonl(join(root, 'absent.jsonl'), target)).rejects.toThrow()
    expect(existsSync(target)).toBe(false)
    expect(readdirSync(join(root, 'out'))).toEqual([])
  })
})

describe('iterJsonl file handles', () => {
  const fdDir = '/proc/self/fd'

  test.runIf(existsSync(fdDir))('closes the file when the caller stops early', async () => {
    const path = join(root, 'session.jsonl')
    writeFileSync(path, TRANSCRIPT, 'utf-8')
    const before = readdirSync(fdDir).length

    for (let round = 0; round < 25; round += 1) {
      for await (const value of iterJsonl(path)) {
        expect(value).toBeTruthy()
        break
      }
    }

    await vi.waitFor(() => {
      expect(readdirSync(fdDir).length).toBeLessThan(before + 5)
    })
  })
})
