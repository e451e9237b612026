import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration
 *
 * Each workspace package is a project with its own vitest.config.ts; this
 * file only fixes what must hold for every run:
 * - deterministic order and no retries
 * - fixed fast-check seed, more runs in CI
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    projects: ['packages/*'],

    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.d.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/types.ts',
      ],
    },

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
