import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/__tests__/**/*.test.ts',
      'packages/db/__tests__/**/*.test.ts',
      'apps/*/src/**/__tests__/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
  },
})
