import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Pacing tests run against the real clock
    testTimeout: 30000,
    hookTimeout: 10000,
    reporters: ['default'],
  },
});
