import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 10_000,
  },
  resolve: {
    extensions: ['.ts', '.js', '.mts', '.mjs'],
    alias: {
      '@tagwire/directive-contracts': pkg('directive-contracts'),
      '@tagwire/directive-core': pkg('directive-core'),
      '@tagwire/task-classifier': pkg('task-classifier'),
      '@tagwire/directive-tools': pkg('directive-tools'),
    },
  },
});
