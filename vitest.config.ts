import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@lexiphrase/words': fileURLToPath(
        new URL('./packages/words/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.spec.ts'],
    environment: 'node',
  },
});
