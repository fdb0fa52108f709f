import { resolve } from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@libs/core': resolve(__dirname, 'libs/core/src'),
      '@libs/market-data': resolve(__dirname, 'libs/market-data/src'),
      '@libs/telegram': resolve(__dirname, 'libs/telegram/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup.ts'],
  },
});
