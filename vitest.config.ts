import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts']
  }
});
