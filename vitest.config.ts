import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      DB_TYPE: 'sqlite',
      SQLITE_PATH: ':memory:',
      FRONTEND_URL: 'http://localhost:5173',
    },
  },
});
