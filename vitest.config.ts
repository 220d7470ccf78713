import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * Workspace test configuration: every package is a Vitest project with
 * its own vitest.config.ts.
 */
export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    retry: 0,
    testTimeout: 10000,
    hookTimeout: 10000,
    reporters: ['default'],
    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: '100',
    },
    projects: ['packages/*'],
  },
});
