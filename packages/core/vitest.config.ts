import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    watch: false,
    // Executions are synchronous; a single fork keeps listener order stable in logs
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    testTimeout: 5000,
    clearMocks: true,
    reporters: ['default'],
  },
});
