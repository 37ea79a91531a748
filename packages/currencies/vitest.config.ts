import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.{spec,test}.ts'],
    environment: 'node',
    globals: false,
  },
  resolve: {
    alias: {
      '@amountkit/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
