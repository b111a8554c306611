/**
 * Vitest configuration.
 *
 * Unit tests live beside the sources; integration and CLI tests live under
 * tests/. The `@/` alias mirrors the `paths` entry in tsconfig.json.
 */
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    environment: 'node',
  },
});
