import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 80,
        statements: 80,
        functions: 80,
        branches: 70,
      },
      exclude: ['node_modules/', 'src/**/*.test.ts', 'tests/**/*.test.ts'],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
});
