import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/fuzz/setup.ts'],
    environment: 'node',
    watch: false,
    testTimeout: 30000, // property suites run many schedulers per case
    hookTimeout: 10000,
    // SQLite tests write temp files; one fork keeps them serial
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
  },
})
