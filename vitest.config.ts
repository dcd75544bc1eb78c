import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@claim-triage/core': path.resolve(__dirname, 'packages/core/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['integration-tests/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
