import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Project mode for the monorepo
    projects: ['packages/@gridbind/*/vitest.config.ts', 'packages/shared-test-utils/vitest.config.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      thresholds: {
        lines: 90,
        functions: 90,
        statements: 90,
        branches: 80,
      },
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.config.{ts,js}',
        '**/*.setup.ts',
        '**/__tests__/**',
        '**/__benchmarks__/**',
      ],
    },
  },
});
