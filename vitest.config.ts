import { defineConfig } from 'vitest/config';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@profile-eval/validation': resolve(__dirname, 'packages/profile-validation/src'),
      '@profile-eval/report': resolve(__dirname, 'packages/profile-report/src'),
    },
  },
  test: {
    include: ['packages/**/*.test.ts'],
    exclude: ['**/node_modules/**'],
    globals: false,
  },
});
