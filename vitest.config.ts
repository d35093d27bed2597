import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    include: [
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
    ],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    // Integration tests spawn real child processes
    testTimeout: 30000,
    hookTimeout: 30000,

    watch: false,
    restoreMocks: true,
    clearMocks: true,
  },
});
