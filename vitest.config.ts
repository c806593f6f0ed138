import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/ts/__tests__/**/*.test.ts'],
    globals: true,
    testTimeout: 20000,
  },
});
