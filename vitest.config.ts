import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for answer-router.
 *
 * Every test runs in-process: chat models, web search and the cache are
 * replaced by fakes or an in-memory SQLite database.
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    pool: 'forks',
    testTimeout: 30000,
    hookTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts'],
    },
  },
});
