import { defineWorkspace } from 'vitest/config';

/**
 * Vitest workspace configuration for the SonarGate monorepo.
 * This enables running tests across all packages with a single command.
 */
export default defineWorkspace([
  // Data-access layer
  {
    extends: './vitest.config.ts',
    test: {
      name: 'sonargate-core',
      root: './packages/core',
      include: ['src/**/*.{test,spec}.ts', 'tests/**/*.{test,spec}.ts'],
    },
  },

  // MCP server
  {
    extends: './vitest.config.ts',
    test: {
      name: 'sonargate-mcp',
      root: './packages/mcp',
      include: ['src/**/*.{test,spec}.ts', 'tests/**/*.{test,spec}.ts'],
    },
  },
]);
