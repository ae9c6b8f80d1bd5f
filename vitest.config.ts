import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their TypeScript sources under the `source` condition.
export default defineConfig({
  resolve: {
    conditions: ['source'],
  },
  ssr: {
    resolve: {
      conditions: ['source'],
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
