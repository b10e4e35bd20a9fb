import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    includeSource: ['src/engine/simulationTestSuite.ts'],
    environment: 'node',
  },
});
