import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    testTimeout: 10000,
    include: [
      'packages/*/src/**/__tests__/*.test.ts',
      'tests/integration/**/*.test.ts',
    ],
  },
});
