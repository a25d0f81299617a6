import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/**/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      NODE_ENV: 'test',
    },
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
