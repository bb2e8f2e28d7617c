import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration
 *
 * Unit, storage and integration tests all run in the Node environment.
 * Integration tests drive the Hono app through `app.request()` against the
 * in-memory store, so no MySQL server is needed.
 */
export default defineConfig({
  test: {
    environment: 'node',

    include: ['test/**/*.test.ts', 'test/**/*.test.tsx'],

    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts', 'src/**/*.tsx'],
      exclude: ['src/index.ts'],
    },
  },
});
