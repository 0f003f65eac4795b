import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolveSource = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@cardiorisk/types': resolveSource('./packages/types/src/index.ts'),
      '@cardiorisk/core': resolveSource('./packages/core/src/index.ts'),
      '@cardiorisk/domain': resolveSource('./packages/domain/src/index.ts'),
      '@cardiorisk/infrastructure': resolveSource('./packages/infrastructure/src/index.ts'),
    },
  },
});
