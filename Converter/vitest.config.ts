import { defineConfig, mergeConfig } from 'vitest/config';
import baseConfig from '../vitest.base.ts';

export default mergeConfig(baseConfig, defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // Executor tests spawn real child processes and measure wall-clock time
    fileParallelism: false,
  },
}));
