import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    setupFiles: [path.resolve(rootDir, './vitest.setup.ts')],
    restoreMocks: true,
    globals: true,
    fileParallelism: false
  }
});
