import { tmpdir } from 'os';
import { join } from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['server/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      // Keep tests away from the user's ~/.bindery
      BINDERY_DATA_DIR: join(tmpdir(), 'bindery-vitest'),
    },
  },
});
