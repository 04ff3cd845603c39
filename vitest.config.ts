import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packages = ['checks', 'cli', 'crypto', 'graph', 'sig', 'store', 'types'];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@tracemark/${pkg}`] = fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: { alias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/cli/src/bin.ts'],
      reporter: ['text', 'text-summary'],
    },
  },
});
