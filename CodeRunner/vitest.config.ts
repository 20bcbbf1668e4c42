import { defineConfig, mergeConfig } from 'vitest/config';
import baseConfig from '../vitest.base.ts';

export default mergeConfig(baseConfig, defineConfig({
  test: {
    name: 'code-runner',
    // Sandbox tests spawn real processes; keep files from competing for CPU
    fileParallelism: false,
  },
}));
