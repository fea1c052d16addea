import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packageSource = (path: string): string => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
    },
  },
  resolve: {
    alias: [
      { find: '@dbversion/core', replacement: packageSource('core/src/index.ts') },
      { find: /^@dbversion\/(postgresql|mysql|sqlite)\/register$/, replacement: packageSource('$1/src/register.ts') },
      { find: /^@dbversion\/(postgresql|mysql|sqlite)$/, replacement: packageSource('$1/src/index.ts') },
    ],
  },
});
