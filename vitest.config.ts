import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolve = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package aliases so suites run against sources
      '@vfs-connect/core': resolve('./packages/core/src/index.ts'),
      '@vfs-connect/http': resolve('./packages/http/src/index.ts'),
    },
  },
  test: {
    root: '.',
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      LOG_LEVEL: 'silent',
    },
    testTimeout: 10000,
  },
});
