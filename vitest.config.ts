import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['api/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000
  }
});
