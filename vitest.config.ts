import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['shared/**/__tests__/**/*.spec.ts'],
    environment: 'node',
    testTimeout: 20_000,
  },
});
