import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/*.test.ts',
      'apps/*/src/**/*.test.ts',
      'apps/*/test/**/*.test.ts',
      'apps/*/test/**/*.integration.ts',
      'apps/*/test/**/*.security.ts',
    ],
    testTimeout: 15000,
    hookTimeout: 30000,
  },
});
