import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'quake-query',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['src/__tests__/setup.ts'],
    testTimeout: 5_000,
    pool: 'forks',
    globals: true,
    environment: 'node',
    env: {
      // Library warnings on expected failures would drown the reporter
      LOG_LEVEL: 'error',
    },
  },
});
