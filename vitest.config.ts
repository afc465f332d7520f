import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@edgebar/shared': path.resolve(__dirname, 'packages/shared/src/index.ts'),
      '@edgebar/panel-server': path.resolve(__dirname, 'packages/panel-server/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: [
      'packages/shared/src/**/*.test.ts',
      'packages/panel-server/src/**/*.test.ts',
      'packages/panel-cli/src/**/*.test.ts',
    ],
  },
});
