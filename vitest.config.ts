import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration
 *
 * Every test runs against in-process fakes for the search index and the
 * models; see vitest.setup.ts.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
    pool: 'forks',
  },
});
