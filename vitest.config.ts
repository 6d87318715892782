import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@noi-extract/shared': fileURLToPath(
        new URL('./packages/shared/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['integration-tests/tests/**/*.test.ts'],
    testTimeout: 20000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
