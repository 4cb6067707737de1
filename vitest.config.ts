import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Importing the engine loads the TypeScript compiler
    testTimeout: 10000,
    globals: true,
  },
});
