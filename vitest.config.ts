import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    env: {
      SCORE_SHEETS_LOG_LEVEL: 'silent',
    },
  },
});
