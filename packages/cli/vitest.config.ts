import { defineConfig } from 'vitest/config';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  test: {
    name: 'cli',
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    globals: false,
  },
  resolve: {
    alias: {
      'vitetags-shared': resolve(__dirname, '../shared/src/index.ts'),
      'vitetags-core': resolve(__dirname, '../core/src/index.ts'),
    },
  },
});
