import { defineConfig } from 'vitest/config';
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/__tests__/**/*.spec.ts'],
    coverage: { include: ['packages/*/src/**'], thresholds: { lines: 90 } },
  }
});
