import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // MathJax loads all TeX packages on first render
    testTimeout: 30000,
  },
});
