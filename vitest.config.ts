import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/unit/**/*.test.ts', 'tests/integration/**/*.test.ts'],
    testTimeout: 10000,
    // Drops the fake fetch installed by tests/helpers/fake-network.ts
    unstubGlobals: true,
    alias: {
      '@anthropic-ai/sdk': './tests/mocks/anthropic.ts',
    },
  },
});
