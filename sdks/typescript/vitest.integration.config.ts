import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@shardscroll\/client\/(.*)$/,
        replacement: path.resolve(__dirname, './src/$1.ts'),
      },
      {
        find: '@shardscroll/client',
        replacement: path.resolve(__dirname, './src/index.ts'),
      },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/integration/**/*.test.ts'],
    // Longer timeouts for integration tests
    testTimeout: 30000,
    hookTimeout: 30000,
    teardownTimeout: 10000,
    // Run tests sequentially against one mock cluster at a time
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['dist/**', 'tests/**'],
    },
  },
});
