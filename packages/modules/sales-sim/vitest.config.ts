import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolveSrc = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@salesim/shared': resolveSrc('../../shared/src'),
      '@salesim/db': resolveSrc('../../db/src'),
      '@salesim/core': resolveSrc('../../core/src'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 30_000,
    include: ['src/**/*.test.ts'],
  },
});
