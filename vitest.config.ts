/**
 * FILE PURPOSE: Root Vitest config for the monorepo
 *
 * HOW: Discovers tests in packages/ and apps/. Workspaces carry their own
 *      config for running `vitest run` from inside the workspace directory.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    passWithNoTests: false,
    coverage: {
      provider: 'v8',
      include: ['packages/**/src/**/*.ts', 'apps/**/src/**/*.ts'],
      exclude: ['**/index.ts'],
    },
  },
});
