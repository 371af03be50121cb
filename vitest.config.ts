import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    include: ['packages/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // Key generation for the JWT fixtures is slow on small CI machines
    testTimeout: 10000,
    isolate: true,
    coverage: {
      reporter: ['text', 'lcov'],
      exclude: ['node_modules/', 'test/', '**/*.d.ts'],
    },
  },
  resolve: {
    alias: {
      '@kernel': path.resolve(__dirname, 'packages/kernel'),
      '@security': path.resolve(__dirname, 'packages/security'),
      '@config': path.resolve(__dirname, 'packages/config'),
      '@errors': path.resolve(__dirname, 'packages/errors'),
      '@packages': path.resolve(__dirname, 'packages'),
    },
  },
});
