import { tmpdir } from 'os';
import { join } from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      NODE_ENV: 'test',
      // Keep config and covers written during tests out of the home directory
      TOMEKEEPER_HOME: join(tmpdir(), `tomekeeper-test-${process.pid}`),
    },
    testTimeout: 10000,
  },
});
