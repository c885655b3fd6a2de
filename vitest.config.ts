import path from 'node:path';
import { defineConfig } from 'vitest/config';

const repoRoot = __dirname;
const alias = {
  '@libs/http-client-core': path.resolve(repoRoot, 'libs/http-client-core/src/index.ts'),
  '@libs/dashboard-client': path.resolve(repoRoot, 'libs/dashboard-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/**/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
