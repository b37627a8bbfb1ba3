import { defineConfig } from 'vitest/config';

/**
 * Shared Vitest configuration for workspaces
 * Individual workspaces extend this configuration with mergeConfig
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    clearMocks: true,
    mockReset: true,
    restoreMocks: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/*.config.*',
        '**/__tests__/**',
        '**/*.test.ts',
      ],
    },
  },
});
