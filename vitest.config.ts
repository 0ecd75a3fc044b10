import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: 'coverage',
      include: ['packages/agent/src/**/*.ts', 'packages/shared/src/**/*.ts'],
      exclude: ['tests/**', 'packages/**/dist/**', 'packages/agent/src/main.ts'],
      thresholds: {
        statements: 10,
        lines: 10,
        functions: 10,
        branches: 5
      }
    }
  }
});
