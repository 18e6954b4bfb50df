import { resolve } from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'shared/src/**/__tests__/**/*.{spec,test}.ts',
      'worker/src/**/__tests__/**/*.{spec,test}.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@media-pipeline/shared': resolve(__dirname, 'shared/src/index.ts'),
      '@': resolve(__dirname, 'worker/src'),
    },
  },
});
