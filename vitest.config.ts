import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // the CLI tests chdir, which worker threads do not allow
    pool: 'forks',
  },
})
