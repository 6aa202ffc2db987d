import { defineConfig } from 'vitest/config';

/**
 * Workspace test configuration.
 *
 * Every package under packages/ is a project with its own vitest.config.ts;
 * runs are deterministic (no retries, fixed fast-check seed via env).
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,
    reporters: ['default'],
    projects: ['packages/*'],
    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
