import { configDefaults, defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 30000,
    hookTimeout: 30000,
    include: [
      'tests/unit/**/*.test.ts',
      'tests/integration/**/*.test.ts',
      'tests/sql-injection/**/*.test.ts',
    ],
    exclude: [...configDefaults.exclude, '**/dist/**'],
    fileParallelism: true,
  },
})
