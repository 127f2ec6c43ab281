import { existsSync } from 'node:fs'
import { readdir, stat } from 'node:fs/promises'
import { basename, join, relative } from 'node:path'

import { AmbiguousSessionError, SessionNotFoundError } from '../errors'
import { findInJson } from '../utils/json-value'
import { iterJsonl } from './messages'
import { resolveUserPath } from './paths'

const SESSION_EXTENSION = '.jsonl'
const CWD_SCAN_MAX_LINES = 200

export type SessionFile = {
  path: string
  /** Path relative to the sessions dir, with forward slashes. */
  displayPath: string
  sizeBytes: number
  modifiedMs: number
}

export type SessionEntry = SessionFile & {
  index: number
  cwd: string | null
}

async function collectJsonlFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  const files: string[] = []
  for (const entry of entries) {
    const fullPath = join(dir, entry.name)
    if (entry.isDirectory()) {
      files.push(...(await collectJsonlFiles(fullPath)))
    } else if (entry.isFile() && entry.name.endsWith(SESSION_EXTENSION)) {
      files.push(fullPath)
    }
  }
  return files
}

/** Session files under `sessionsDir`, most recently modified first. */
export async function listSessions(
  sessionsDir: string,
  limit?: number | null,
): Promise<SessionFile[]> {
  if (!existsSync(sessionsDir)) return []
  const paths = await collectJsonlFiles(sessionsDir)
  const files = await Promise.all(
    paths.map(async (path): Promise<SessionFile> => {
      const stats = await stat(path)
      return {
        path,
        displayPath: relative(sessionsDir, path).split('\\').join('/'),
        sizeBytes: stats.size,
        modifiedMs: stats.mtimeMs,
      }
    }),
  )
  files.sort((a, b) => b.modifiedMs - a.modifiedMs)
  return limit && limit > 0 ? files.slice(0, limit) : files
}

export async function describeSessions(
  sessionsDir: string,
  limit?: number | null,
): Promise<SessionEntry[]> {
  const files = await listSessions(sessionsDir, limit)
  return Promise.all(
    files.map(async (file, offset) => ({
      ...file,
      index: offset + 1,
      cwd: await extractCwdFromSession(file.path),
    })),
  )
}

/**
 * Turn a user-supplied reference into a session file: a 1-based index into
 * the recency listing, an existing path, or a file name that is unique
 * under `sessionsDir`.
 */
export async function resolveSessionPath(
  candidate: string,
  sessionsDir: string,
): Promise<string> {
  const stripped = candidate.trim()
  if (/^\d+$/.test(stripped)) {
    const files = await listSessions(sessionsDir)
    if (files.length === 0) {
      throw new SessionNotFoundError(`No session files found under ${sessionsDir}`)
    }
    const index = Number(stripped)
    if (index < 1 || index > files.length) {
      throw new SessionNotFoundError(
        `Session index ${index} out of range (1..${files.length}).`,
      )
    }
    return files[index - 1].path
  }

  const direct = resolveUserPath(candidate)
  if (existsSync(direct)) return direct

  const matches = existsSync(sessionsDir)
    ? (await collectJsonlFiles(sessionsDir)).filter(
        (path) => basename(path) === candidate,
      )
    : []
  if (matches.length === 0) {
    throw new SessionNotFoundError(`Session not found: ${candidate}.`, [
      `Provide a full path or a filename that exists under ${sessionsDir}.`,
    ])
  }
  if (matches.length > 1) {
    throw new AmbiguousSessionError(candidate, matches.sort())
  }
  return matches[0]
}

export function extractCwdFromText(text: string): string | null {
  const startTag = '<cwd>'
  const endTag = '</cwd>'
  const start = text.indexOf(startTag)
  if (start === -1) return null
  const from = start + startTag.length
  const end = text.indexOf(endTag, from)
  if (end === -1) return null
  const cwd = text.slice(from, end).trim()
  return cwd || null
}

/** Find the first `<cwd>` tag in the opening lines of a transcript. */
export async function extractCwdFromSession(
  path: string,
  maxLines = CWD_SCAN_MAX_LINES,
): Promise<string | null> {
  let seen = 0
  for await (const record of iterJsonl(path)) {
    const cwd = findInJson(record, extractCwdFromText)
    if (cwd) return cwd
    seen += 1
    if (seen >= maxLines) break
  }
  return null
}
