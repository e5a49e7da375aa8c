import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

/**
 * Runs every workspace's tests in one pass.
 * Workspace packages resolve to their TypeScript sources, so no build is needed first.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@ec2-restore/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    globals: true,
    include: [
      'packages/*/src/**/*.test.ts',
      'apps/*/src/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist'],
    clearMocks: true,
    restoreMocks: true,
  },
});
