import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    env: {
      OUTLINE_CHAT_LOG_LEVEL: 'silent',
    },
  },
});
