import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['*.test.ts', 'Vendors/**/*.test.ts'],
    environment: 'node',
  },
});
