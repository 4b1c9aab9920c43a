import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['assistant/src/**/*.test.ts'],
    environment: 'node',
  },
});
