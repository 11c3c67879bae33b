import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/matching/**/*.ts', 'src/integrity/**/*.ts', 'src/session/**/*.ts'],
      exclude: [
        'src/**/__tests__/**',
        'src/*/index.ts', // Re-exports only
        'src/*/types.ts', // Type definitions only
      ],
    },
    testTimeout: 30000,
  },
});
