import { defineConfig } from 'vitest/config';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const root = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    // Global test configuration
    globals: true,
    environment: 'node',

    // Test timeout settings
    testTimeout: 10000,
    hookTimeout: 15000,

    include: ['packages/**/tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Test setup
    setupFiles: ['./test-setup.ts'],
  },

  // Resolve configuration for monorepo
  resolve: {
    alias: {
      '@threadsage/shared': resolve(root, 'packages/shared/src/index.ts'),
    },
  },
});
