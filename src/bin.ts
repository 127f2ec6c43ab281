#!/usr/bin/env node
import { main } from './cli'
import { exitCodeFor } from './cli/io'

main().then(
  () => {
    // abandoned generations would otherwise hold the event loop open
    if (process.exitCode === 130) process.exit(130)
  },
  (error: unknown) => {
    const message = error instanceof Error ? error.message : String(error)
    console.error(message)
    const code = exitCodeFor(error)
    if (code === 130) process.exit(code)
    process.exitCode = code
  },
)
