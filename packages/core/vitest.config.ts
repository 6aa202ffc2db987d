import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'core',
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    // property-based tests run a few hundred reflections
    testTimeout: 10000,
    env: {
      TEST_SEED: '424242',
      FC_NUM_RUNS: '100',
    },
  },
});
