import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // koffi and tree-sitter are native addons; keep them to one worker process.
    pool: 'forks',
    fileParallelism: false,
  },
});
