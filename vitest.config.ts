import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'packages/**/src/**/*.{test,spec}.ts',
      'examples/dev-server/src/tests/**/*.{test,spec}.ts',
    ],
    environment: 'node',
    globals: false,
    isolate: false,         // share Vite context across tests (faster)
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
    },
  },
  resolve: {
    alias: {
      '@amountkit/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@amountkit/currencies': fileURLToPath(new URL('./packages/currencies/src/index.ts', import.meta.url)),
    },
  },
});
