import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['triage-*/src/**/*.test.{ts,tsx}'],
    environment: 'node',
  },
});
