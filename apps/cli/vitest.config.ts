import { defineConfig, mergeConfig } from 'vitest/config';
import sharedConfig from '../../vitest.shared.config.js';

/**
 * Unit tests only: supervisor and journal processes are replaced with
 * in-process fakes, nothing is spawned.
 */
export default mergeConfig(
  sharedConfig,
  defineConfig({
    test: {
      name: 'cli',
      include: ['src/**/*.test.ts'],
      exclude: ['node_modules', 'dist'],
    },
  })
);
