import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    // Only include test files in tests/ directory
    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
