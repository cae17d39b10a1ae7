import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/logger/src/**/*.test.ts', 'packages/http/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**', '**/node_modules/**'],
    globals: true,
    environment: 'node',
  },
});
