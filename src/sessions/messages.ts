import { createReadStream } from 'node:fs'
import { mkdir, open, rename, rm } from 'node:fs/promises'
import { dirname } from 'node:path'
import { createInterface } from 'node:readline'

import {
  isJsonObject,
  parseJsonValue,
  type JsonObject,
  type JsonValue,
} from '../utils/json-value'

/** A transcript line that represents a conversational turn. */
export type TranscriptMessage = JsonObject

/**
 * Yield every parseable JSON value in a JSON Lines file. Blank and malformed
 * lines are skipped; the file is read line by line.
 */
export async function* iterJsonl(path: string): AsyncGenerator<JsonValue> {
  const stream = createReadStream(path, { encoding: 'utf-8' })
  const lines = createInterface({ input: stream, crlfDelay: Infinity })
  try {
    for await (const line of lines) {
      const trimmed = line.trim()
      if (!trimmed) continue
      const value = parseJsonValue(trimmed)
      if (value === undefined) continue
      yield value
    }
  } finally {
    lines.close()
    stream.destroy()
  }
}

/**
 * Return the message carried by a transcript record, if any.
 *
 * Records with `type: "message"` are messages as-is. Records wrapping a
 * message in `payload` are unwrapped; the outer `timestamp` and `id` are
 * copied onto the message as `timestamp` and `response_id` unless it already
 * has them.
 */
export function extractMessage(record: JsonValue): TranscriptMessage | null {
  if (!isJsonObject(record)) return null
  if (record.type === 'message') return record

  const payload = record.payload
  if (!isJsonObject(payload) || payload.type !== 'message') return null

  const message: TranscriptMessage = { ...payload }
  const timestamp = record.timestamp
  if (timestamp !== undefined && timestamp !== null && !('timestamp' in message)) {
    message.timestamp = timestamp
  }
  const responseId = record.id
  if (responseId && !('response_id' in message)) {
    message.response_id = responseId
  }
  return message
}

export async function* iterMessages(
  path: string,
): AsyncGenerator<TranscriptMessage> {
  for await (const record of iterJsonl(path)) {
    const message = extractMessage(record)
    if (message) yield message
  }
}

export async function readMessages(path: string): Promise<TranscriptMessage[]> {
  const messages: TranscriptMessage[] = []
  for await (const message of iterMessages(path)) {
    messages.push(message)
  }
  return messages
}

/**
 * Write only the message lines of `source` to `target` and return how many
 * were written. `target` is replaced only once the whole source has been
 * read; on failure it is left as it was.
 */
export async function writeMessagesJsonl(
  source: string,
  target: string,
): Promise<number> {
  await mkdir(dirname(target), { recursive: true })
  const partial = `${target}.${process.pid}.partial`
  let count = 0
  try {
    const handle = await open(partial, 'w')
    try {
      for await (const message of iterMessages(source)) {
        await handle.write(`${JSON.stringify(message)}\n`)
        count += 1
      }
    } finally {
      await handle.close()
    }
    await rename(partial, target)
  } catch (error) {
    await rm(partial, { force: true })
    throw error
  }
  return count
}
