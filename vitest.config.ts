import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    env: {
      FILM_AGENT_LOG_LEVEL: 'silent',
    },
  },
});
