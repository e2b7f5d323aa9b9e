import { defineConfig, mergeConfig } from 'vitest/config';
import baseConfig from './vitest.base.ts';

// Runs every workspace's tests from the repository root.
export default mergeConfig(baseConfig, defineConfig({
  test: {
    // Executor tests spawn real processes and time them
    fileParallelism: false,
    include: [
      'Shared/tests/**/*.test.ts',
      'Converter/tests/**/*.test.ts',
    ],
  },
}));
