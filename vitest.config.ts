/**
 * Vitest Configuration
 * @module vitest.config
 *
 * Test configuration for the IaC graph enrichment engine.
 */

import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    globals: true,
    environment: 'node',

    // Test file patterns
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],

    // Setup files
    setupFiles: ['./tests/setup.ts'],

    testTimeout: 30000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['**/*.d.ts', '**/index.ts', 'src/types/**/*.ts'],
    },

    // Sequence configuration
    sequence: {
      shuffle: false,
      concurrent: false,
    },

    clearMocks: true,
    restoreMocks: true,
  },

  // Path resolution
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },

  esbuild: {
    target: 'node20',
  },
});
