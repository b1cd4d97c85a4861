import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      'focuslog-shared': path.resolve(__dirname, 'focuslog-shared/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['focuslog-shared/src/**/*.test.ts', 'focuslog-cli/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
