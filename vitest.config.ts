import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent'
    },
    testTimeout: 10000,
    hookTimeout: 10000
  }
});
