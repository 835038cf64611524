import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // tool-runner tests exec scripts they have just written
    pool: 'forks',
    testTimeout: 10000
  }
})
