import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import { SummaryFormatError } from '../errors'
import {
  composeDocument,
  ensureTrailingNewline,
  FrontmatterShapeError,
  isFrontmatter,
  parseFrontmatter,
} from '../utils/frontmatter'
import type {
  SummaryLookup,
  SummaryMetadata,
  SummaryRecord,
} from './types'

export type SummaryDocument = {
  metadata: SummaryMetadata
  body: string
}

export function splitSummaryDocument(text: string): SummaryDocument {
  try {
    const { frontmatter, body } = parseFrontmatter(text)
    return { metadata: frontmatter, body }
  } catch (error) {
    if (error instanceof FrontmatterShapeError) {
      throw new SummaryFormatError('Summary front matter must deserialize to a mapping')
    }
    throw error
  }
}

export async function loadSummary(markdownPath: string): Promise<SummaryRecord> {
  const text = await readFile(markdownPath, 'utf-8')
  const { metadata, body } = splitSummaryDocument(text)
  return { body, cachePath: markdownPath, metadata, cached: true }
}

/**
 * Persist a summary as markdown with YAML front matter. Parent directories
 * are created; an existing file is replaced.
 */
export async function writeSummary(
  markdownPath: string,
  body: string,
  metadata: unknown = {},
): Promise<SummaryRecord> {
  if (!isFrontmatter(metadata)) {
    throw new TypeError('metadata must be a mapping')
  }
  const serialized: SummaryMetadata = { ...metadata }
  await mkdir(dirname(markdownPath), { recursive: true })
  await writeFile(markdownPath, composeDocument(serialized, body), 'utf-8')
  return {
    body: ensureTrailingNewline(body),
    cachePath: markdownPath,
    metadata: serialized,
    cached: true,
  }
}

export async function lookupSummary(cachePath: string): Promise<SummaryLookup> {
  if (!existsSync(cachePath)) {
    return { status: 'not_found', cachePath }
  }
  return { status: 'found', record: await loadSummary(cachePath) }
}

export function renderSummary(
  record: SummaryRecord,
  options: { stripMetadata?: boolean } = {},
): string {
  if (options.stripMetadata) {
    return ensureTrailingNewline(record.body)
  }
  return composeDocument(record.metadata, record.body)
}
