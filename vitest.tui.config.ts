import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/tui/**/*.test.ts'],
    testTimeout: 20000,
  },
})
