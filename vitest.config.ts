import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    testTimeout: 15000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
