import { defineConfig } from 'vitest/config';

/**
 * Shared Vitest settings, extended by every project in vitest.workspace.ts.
 */
export default defineConfig({
  test: {
    environment: 'node',
    testTimeout: 10000,
    restoreMocks: true,
  },
});
