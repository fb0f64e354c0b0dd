import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['file-sweep/src/**/*.test.ts'],
    environment: 'node'
  }
});
