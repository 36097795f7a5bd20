import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      DATA_DIR: ':memory:',
      LOG_LEVEL: 'error'
    }
  }
});
