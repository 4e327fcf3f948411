import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolveFromHere = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    name: 'discovery-core',
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      NODE_ENV: 'test',
    },
  },
  resolve: {
    alias: {
      '@kube-discovery/core': resolveFromHere('./src/index.ts'),
      '@kube-discovery/test-utils': resolveFromHere('../shared/test-utils/src/index.ts'),
    },
  },
});
