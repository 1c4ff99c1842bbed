import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    testTimeout: 30_000,
    coverage: {
      exclude: [
        'src/index.ts',
        'dist/**',
        'tsup.config.ts',
        'vitest.config.ts',
      ],
    },
  },
});
