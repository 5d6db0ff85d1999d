import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration: one run covers every workspace package.
 *
 * - Forks pool for isolation (threads on Windows)
 * - No retries, so flaky tests surface immediately
 * - Extended timeouts for property-based testing with fast-check
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    pool: process.platform === 'win32' ? 'threads' : 'forks',

    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    retry: 0,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/__fixtures__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
    },
  },
});
