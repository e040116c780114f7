import { defineConfig } from 'vitest/config';

// Calendar windows use the process's local time zone; tests assume UTC.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: { TZ: 'UTC' },
  },
});
