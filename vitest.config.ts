import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Globals
    globals: true,

    // Test file patterns
    include: ['tests/**/*.{test,spec}.ts'],

    // Timeout for each test
    testTimeout: 10000,

    // Coverage
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'], // Exclude main entry point
    },
  },
});
