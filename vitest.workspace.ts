/**
 * Vitest Workspace Configuration
 *
 * One project per package, sharing vitest.config.ts.
 *
 * Run specific projects:
 *   npx vitest --project=core
 *   npx vitest --project=cli
 */
import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  {
    extends: './vitest.config.ts',
    test: {
      name: 'core',
      include: ['packages/core/tests/**/*.test.ts'],
    },
  },
  {
    extends: './vitest.config.ts',
    test: {
      name: 'cli',
      include: ['packages/cli/tests/**/*.test.ts'],
    },
  },
]);
