import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package aliases so tests run against sources
      '@provrec/kernel': pkg('kernel'),
      '@provrec/schema': pkg('schema'),
      '@provrec/record': pkg('record'),
      '@provrec/runtime': pkg('runtime'),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
