import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
    env: {
      DASHBOARD_LOG_LEVEL: 'silent'
    }
  }
});
