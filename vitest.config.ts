import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Timeouts
    testTimeout: 10000,
    hookTimeout: 10000,

    // Reporter configuration
    reporters: ['default'],

    // Global setup to suppress console output during tests
    setupFiles: ['./test/setup.ts'],

    // Pool configuration for parallel execution
    pool: 'forks',

    // Clear mocks between tests
    clearMocks: true,
    restoreMocks: true,
  },
});
