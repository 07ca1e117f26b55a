/**
 * FILE PURPOSE: Root Vitest config for the workspace
 *
 * WHY: `npm test` at the root runs every package's tests in one pass.
 *      Packages keep their own config for running in isolation.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts'],
    passWithNoTests: false,
    coverage: {
      provider: 'v8',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['**/index.ts'],
    },
  },
});
