export type JsonPrimitive = string | number | boolean | null
export type JsonObject = { [key: string]: JsonValue }
export type JsonArray = JsonValue[]
export type JsonValue = JsonPrimitive | JsonObject | JsonArray

export type JsonVisitor<R> = {
  object: (value: JsonObject) => R
  array: (value: JsonArray) => R
  string: (value: string) => R
  number: (value: number) => R
  boolean: (value: boolean) => R
  null: () => R
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function visitJson<R>(value: JsonValue, visitor: JsonVisitor<R>): R {
  if (value === null) return visitor.null()
  if (Array.isArray(value)) return visitor.array(value)
  switch (typeof value) {
    case 'string':
      return visitor.string(value)
    case 'number':
      return visitor.number(value)
    case 'boolean':
      return visitor.boolean(value)
    default:
      return visitor.object(value)
  }
}

/**
 * Parse a single JSON document. Returns undefined on syntax errors so callers
 * streaming JSONL can drop the line and keep going.
 */
export function parseJsonValue(text: string): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(text)
    return parsed
  } catch {
    return undefined
  }
}

/**
 * Depth-first search over a JSON value. `pick` sees every string leaf and the
 * `text` field of every object (before that object's other values); the first
 * non-null result wins.
 */
export function findInJson<T>(
  value: JsonValue,
  pick: (text: string) => T | null,
): T | null {
  return visitJson<T | null>(value, {
    string: (text) => pick(text),
    array: (items) => {
      for (const item of items) {
        const found = findInJson(item, pick)
        if (found !== null) return found
      }
      return null
    },
    object: (record) => {
      const text = record.text
      if (typeof text === 'string') {
        const found = pick(text)
        if (found !== null) return found
      }
      for (const [key, child] of Object.entries(record)) {
        if (key === 'text') continue
        const found = findInJson(child, pick)
        if (found !== null) return found
      }
      return null
    },
    number: () => null,
    boolean: () => null,
    null: () => null,
  })
}
