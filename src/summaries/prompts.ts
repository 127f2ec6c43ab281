import { existsSync, readFileSync, statSync } from 'node:fs'
import { join, resolve } from 'node:path'

import { PromptNotFoundError, PromptValidationError } from '../errors'
import { expandHome, resolveUserPath } from '../sessions/paths'

export type PromptDocument = {
  content: string
  path: string
}

export type PromptLoaderOptions = {
  /** Searched before the built-in prompts. */
  promptsDir?: string | null
  /** Searched after the built-in prompts. */
  extraSearchDirs?: string[]
}

export const BUILTIN_PROMPTS_DIR = resolve(__dirname, '..', '..', 'prompts')

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile()
}

export function validatePrompt(content: string, path: string): void {
  const openTokens = content.split('{{').length - 1
  const closeTokens = content.split('}}').length - 1
  if (openTokens !== closeTokens) {
    throw new PromptValidationError(
      `Prompt '${path}' has mismatched template braces: ${openTokens} '{{' vs ${closeTokens} '}}'.`,
    )
  }
  if (openTokens === 0) {
    throw new PromptValidationError(
      `Prompt '${path}' does not include any template placeholders; expected at least one '{{...}}'.`,
    )
  }
}

/** Resolves prompt names to template files and validates them on load. */
export class PromptLoader {
  readonly searchDirs: string[]

  constructor(options: PromptLoaderOptions = {}) {
    const dirs = [BUILTIN_PROMPTS_DIR]
    if (options.promptsDir) {
      dirs.unshift(resolveUserPath(options.promptsDir))
    }
    for (const directory of options.extraSearchDirs ?? []) {
      const expanded = resolveUserPath(directory)
      if (!dirs.includes(expanded)) dirs.push(expanded)
    }
    this.searchDirs = dirs
  }

  resolve(prompt: string): string {
    const candidate = expandHome(prompt)
    if (isFile(candidate)) return resolve(candidate)

    for (const directory of this.searchDirs) {
      for (const variant of this.variantCandidates(directory, prompt)) {
        if (isFile(variant)) return variant
      }
    }

    throw new PromptNotFoundError(
      `Prompt '${prompt}' was not found. Checked ${candidate} and search dirs: ${this.searchDirs.join(', ')}.`,
      ['Pass a template path, or add <name>.md to one of the prompt dirs.'],
    )
  }

  load(prompt: string): PromptDocument {
    const path = this.resolve(prompt)
    const content = readFileSync(path, 'utf-8')
    validatePrompt(content, path)
    return { content, path }
  }

  private variantCandidates(baseDir: string, prompt: string): string[] {
    const name = prompt.includes('.') ? prompt : `${prompt}.md`
    const candidates = [join(baseDir, name)]
    if (!name.endsWith('.txt')) {
      candidates.push(join(baseDir, `${prompt}.txt`))
    }
    return candidates
  }
}
