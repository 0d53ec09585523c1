import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@gridscan/types': path.resolve(root, 'packages/types/src/index.ts'),
      '@gridscan/grid-extract': path.resolve(root, 'packages/grid-extract/src/index.ts'),
      '@gridscan/locators': path.resolve(root, 'packages/locators/src/index.ts'),
      '@gridscan/output': path.resolve(root, 'packages/output/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
