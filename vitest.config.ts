import { defineConfig } from 'vitest/config'
import { sharedConfig } from './vitest.shared.js'

export default defineConfig({
  ...sharedConfig,
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.artifacts/**'],
  },
})
