import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^num-core\/(.*)$/, replacement: path.resolve(root, 'packages/num-core/src/$1') },
      { find: /^num-core$/, replacement: path.resolve(root, 'packages/num-core/src/index.ts') },
      { find: /^core-types$/, replacement: path.resolve(root, 'packages/core-types/src/index.ts') },
      { find: /^poly-fit$/, replacement: path.resolve(root, 'packages/poly-fit/src/index.ts') },
      { find: /^lattice-core$/, replacement: path.resolve(root, 'packages/lattice-core/src/index.ts') },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
