import { defineConfig } from 'vitest/config';

// Date formatting uses local time
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      TZ: 'UTC',
    },
  },
});
