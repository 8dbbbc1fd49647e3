import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    watch: false,
    pool: 'forks',
    testTimeout: 5000,
    clearMocks: true,
    reporters: ['default'],
  },
});
