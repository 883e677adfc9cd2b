import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@salesim/shared': fileURLToPath(new URL('../shared/src', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10_000,
    include: ['src/**/*.test.ts'],
  },
});
