import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Node environment for the CLI
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    setupFiles: ['src/__tests__/setup.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    clearMocks: true,
    restoreMocks: true,
  },
});
