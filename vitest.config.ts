import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(__dirname, 'node/src'),
    },
  },
  test: {
    include: ['node/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_TYPE: 'hidden',
    },
  },
});
