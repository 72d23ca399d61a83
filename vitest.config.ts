import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageSource = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '*.config.ts'],
    },
  },
  resolve: {
    alias: {
      '@quotebook/contracts': packageSource('contracts'),
      '@quotebook/db-simple': packageSource('db-simple'),
      '@quotebook/logger': packageSource('logger'),
      '@quotebook/market-calendar': packageSource('market-calendar'),
      '@quotebook/range-cache': packageSource('range-cache'),
      '@quotebook/symbol-directory': packageSource('symbol-directory'),
    },
  },
});
