import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    // sharp is not safe to load first inside worker threads
    pool: 'forks',
    testTimeout: 20000,
  },
});
