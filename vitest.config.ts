import { defineConfig } from 'vitest/config';

/**
 * Single root configuration for every workspace package.
 * Property tests are deterministic: fast-check reads its seed and run count
 * from the env block below through test/setup.ts.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    setupFiles: ['./test/setup.ts'],

    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // No retries - surface issues immediately
    retry: 0,
    testTimeout: isCI ? 60000 : 30000,

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
