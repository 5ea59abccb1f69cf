import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/test/**/*.test.ts'],
    clearMocks: true,
    unstubGlobals: true
  }
});
