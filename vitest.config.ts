import { defineConfig } from 'vitest/config';

/**
 * payloadprobe test configuration
 *
 * Each workspace package is a Vitest project with its own vitest.config.ts.
 * Runs are deterministic: no retries, and property tests get extended
 * timeouts.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',

    // No retries - surface issues immediately
    retry: 0,

    // Disable file parallelization in CI for deterministic results
    fileParallelism: !isCI,

    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/types/index.ts',
      ],
    },

    // Projects configuration for monorepo - each package is a project
    projects: ['packages/*'],

    env: {
      NODE_ENV: 'test',
    },
  },
});
