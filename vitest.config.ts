import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    // PGlite boots a WASM Postgres per database test file.
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
})
