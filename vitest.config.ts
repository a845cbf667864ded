import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages resolve to TypeScript source
      '@wgpeers/config': fileURLToPath(new URL('./packages/config/src/index.ts', import.meta.url)),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
    // Fail fast on first error in CI
    bail: process.env.CI ? 1 : 0,
  },
});
