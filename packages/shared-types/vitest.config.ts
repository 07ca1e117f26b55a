/**
 * Workspace-level Vitest config for @docchunk/shared-types
 *
 * WHY: Pure types package — the only tests check that the shapes compose.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    passWithNoTests: true,
  },
});
