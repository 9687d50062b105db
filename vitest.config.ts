import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['**/__tests__/**', '**/*.test.ts', '**/index.ts', '**/*.config.*'],
    },
    setupFiles: ['./vitest.setup.ts'],
    // In-process Postgres takes a moment to boot
    testTimeout: 20000,
    hookTimeout: 30000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@vitalcheck/types': path.resolve(root, 'packages/types/src/index.ts'),
      '@vitalcheck/core': path.resolve(root, 'packages/core/src/index.ts'),
    },
  },
});
