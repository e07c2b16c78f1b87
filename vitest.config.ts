import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'tools/**/*.test.ts'],
    env: {
      LOGLEVEL: 'silent',
    },
    mockReset: true,
    restoreMocks: true,
  },
});
