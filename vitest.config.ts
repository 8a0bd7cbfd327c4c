import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*_test.ts'],
    setupFiles: ['tests/setup/vitest.setup.ts'],
    hookTimeout: 30000,
  },
})
