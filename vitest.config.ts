import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/**/test/**/*.test.ts', 'scripts/test/**/*.test.ts'],
    testTimeout: 10000,
  },
});
