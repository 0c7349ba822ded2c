import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration
 *
 * Unit tests live under test/ and run in a plain Node.js environment.
 */
export default defineConfig({
  test: {
    globals: true,

    environment: 'node',

    include: ['test/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['node_modules/', 'test/', '*.config.ts', 'dist/', 'coverage/'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 70,
        statements: 80,
      },
      all: true,
      clean: true,
    },
    setupFiles: ['./test/setup.ts'],
    fileParallelism: false, // Config and logger tests mutate process.env
  },
});
