import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const workspace = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@tunegrab/utils': workspace('./packages/utils/src/index.ts'),
      '@tunegrab/core': workspace('./packages/core/src/index.ts'),
      '@tunegrab/acquisition': workspace('./packages/acquisition/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
