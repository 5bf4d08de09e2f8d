import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@manifestly/core': fileURLToPath(new URL('./packages/manifestly-core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
});
