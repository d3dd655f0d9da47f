import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['fixed-geometry/tests/**/*.test.ts'],
    environment: 'node',
  },
});
