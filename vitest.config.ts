import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    env: {
      DATABASE_PATH: ':memory:',
      LOG_LEVEL: 'silent',
      NODE_ENV: 'test'
    }
  }
});
