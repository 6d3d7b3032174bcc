import { tmpdir } from 'os';
import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      LAKESTACK_LOG_DIR: path.join(tmpdir(), 'lakestack-test-logs'),
    },
  },
});
