import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const resolveFromRoot = (p: string) => path.resolve(path.dirname(fileURLToPath(import.meta.url)), p);

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts']
  },
  resolve: {
    alias: {
      '@isoroute/core': resolveFromRoot('packages/core/src/index.ts'),
      '@isoroute/data': resolveFromRoot('packages/data/src/index.ts')
    }
  }
});
