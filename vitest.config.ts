import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Tests mutate process.env and process.cwd-relative temp dirs.
    fileParallelism: false,
    // Signal forwarding tests signal the test process itself; worker threads
    // never see process signal events.
    pool: 'forks',
  },
});
