import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    globals: true,
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    include: [
      'src/**/*.test.ts',
      'src/**/__tests__/**/*.test.ts',
      'test/**/*.spec.ts',
    ],
    // Property-based suites run many iterations
    testTimeout: 10000,
    env: {
      TEST_SEED: process.env.TEST_SEED ?? '424242',
      FC_NUM_RUNS: process.env.FC_NUM_RUNS ?? '100',
    },
  },
});
