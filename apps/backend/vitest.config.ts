import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 20_000,
    hookTimeout: 20_000,
    isolate: true,
    env: {
      // Tests assert on behaviour, not log lines; keep the output readable.
      LOG_LEVEL: 'error',
      NODE_ENV: 'test',
    },
  },
});
