import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@kibble/logger': fromRoot('./packages/logger/src/index.ts'),
      '@kibble/redis': fromRoot('./packages/redis/src/index.ts'),
      '@kibble/brand': fromRoot('./packages/brand/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts', 'apps/*/src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      LOG_LEVEL: 'fatal',
    },
  },
})
