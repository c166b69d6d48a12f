import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['src/**/*.test.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist', '**/examples/**'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/__fixtures__/**', 'src/index.ts'],
    },

    testTimeout: 10000,
    hookTimeout: 10000,

    // Mock reset
    clearMocks: true,
    restoreMocks: true,
  },
});
