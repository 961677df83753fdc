import path from 'path';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
    },
  },
  resolve: {
    alias: {
      '@sqlweave/core': path.resolve(__dirname, 'packages/core/src/index.ts'),
      sqlweave: path.resolve(__dirname, 'packages/sqlweave/src/index.ts'),
    },
  },
});
