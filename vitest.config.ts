import path from 'node:path'

import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      '~': path.resolve(__dirname, 'src'),
    },
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    typecheck: {
      enabled: true,
      include: ['tests/**/*.test-d.ts'],
      tsconfig: './tsconfig.json',
    },
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Ensure deterministic test ordering
    sequence: {
      shuffle: false,
      hooks: 'stack',
    },
  },
})
