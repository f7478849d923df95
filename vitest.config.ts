import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['whatdidido/tests/**/*.test.ts'],
    environment: 'node',
  },
});
