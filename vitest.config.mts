import { defineConfig } from 'vitest/config';
import os from 'os';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Include patterns
    include: [
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
    ],

    // Exclude patterns
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    // ===================================================================
    // PERFORMANCE
    // ===================================================================

    pool: 'threads',
    poolOptions: {
      threads: {
        maxThreads: os.cpus().length,
        minThreads: 1,
        isolate: true,
      },
    },

    fileParallelism: true,

    testTimeout: 30000,
    hookTimeout: 30000,

    // ===================================================================
    // COVERAGE (enable with --coverage)
    // ===================================================================

    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: [
        'packages/*/src/**/*.ts',
        'apps/*/src/**/*.ts',
      ],
      exclude: [
        '**/__tests__/**',
        '**/*.test.ts',
        '**/dist/**',
        '**/*.config.*',
      ],
    },

    reporters: ['default'],

    watch: false,

    // ===================================================================
    // MOCKING & STUBBING
    // ===================================================================

    mockReset: true,
    restoreMocks: true,
    clearMocks: true,
  },
});
