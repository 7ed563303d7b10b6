import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * Root vitest configuration for the whole monorepo.
 * Workspace packages resolve to their TypeScript sources, so tests need no build.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@steward/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/src/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', '**/__tests__/**', '**/tests/**', '**/*.d.ts', '**/*.config.ts'],
    },
    testTimeout: 30000,
    reporters: ['default'],
  },
});
