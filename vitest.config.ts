import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'bridge-service',
    environment: 'node',
    include: ['bridge-service/src/**/*.test.ts'],
    testTimeout: 10000,
  },
});
