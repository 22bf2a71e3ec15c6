import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['server/src/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_DIR: path.join(os.tmpdir(), 'storyloom-test-logs'),
      LOG_LEVEL: 'ERROR',
    },
    silent: true,
  },
});
