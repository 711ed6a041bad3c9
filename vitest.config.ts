import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['backend/tests/**/*_test.ts'],
    exclude: ['backend/tests/**/testhelper.ts'],
    hookTimeout: 30000,
  },
})
