import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.{ts,tsx}'],
    setupFiles: ['./packages/server/src/__tests__/vitest.setup.ts'],
    globals: true,
  },
});
