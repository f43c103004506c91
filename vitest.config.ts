import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/integration/**/*.test.ts',
      'packages/**/tests/properties/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      reportsDirectory: 'coverage',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/**/src/**/index.ts', 'packages/**/src/bin/**'],
    },
  },
  resolve: {
    alias: {
      '@racelab/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@racelab/core': resolveFromRoot('packages/core/src/index.ts'),
      '@racelab/backtest': resolveFromRoot('packages/backtest/src/index.ts'),
      '@racelab/storage': resolveFromRoot('packages/storage/src/index.ts'),
      '@racelab/analytics': resolveFromRoot('packages/analytics/src/index.ts'),
      '@racelab/workflows': resolveFromRoot('packages/workflows/src/index.ts'),
      '@racelab/cli': resolveFromRoot('packages/cli/src/index.ts'),
    },
  },
});
