import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['tests/setup.ts'],
    // A zone east of UTC: spreadsheet dates must not slip to the previous day
    env: { TZ: 'Asia/Kolkata' },
  },
});
