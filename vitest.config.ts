import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@pine-sdk/shared': path.resolve(__dirname, 'packages/shared/src/index.ts'),
      '@pine-sdk/client': path.resolve(__dirname, 'packages/client/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: [
      'packages/shared/src/**/*.test.ts',
      'packages/client/src/**/*.test.ts',
      'packages/cli/src/**/*.test.ts',
    ],
  },
});
