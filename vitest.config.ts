import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    // Every encrypt/decrypt runs 100k PBKDF2 iterations.
    testTimeout: 30_000,
  },
});
