import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages resolve to their TypeScript sources, no build needed.
      '@shellkit/core': path.resolve(root, 'packages/core/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 20_000,
    env: {
      SHELLKIT_DEBUG: '0',
    },
  },
});
