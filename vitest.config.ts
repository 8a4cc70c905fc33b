/**
 * Shared Vitest configuration
 *
 * Tests import the core package by name; the alias points it at the
 * TypeScript sources so no build is needed first.
 */
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@kiln/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    globals: true,
    environment: 'node',
  },
});
