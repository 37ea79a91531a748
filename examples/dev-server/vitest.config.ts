import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.{test,spec}.ts'],
    environment: 'node',
    globals: false,
  },
  resolve: {
    alias: {
      '@amountkit/core': fileURLToPath(new URL('../../packages/core/src/index.ts', import.meta.url)),
      '@amountkit/currencies': fileURLToPath(new URL('../../packages/currencies/src/index.ts', import.meta.url)),
    },
  },
});
