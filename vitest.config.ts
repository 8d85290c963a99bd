import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packages = ['types', 'crypto', 'consensus', 'simulator', 'cli'];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@bftsim/${pkg}`] = fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
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
      thresholds: {
        statements: 95,
        branches: 90,
        functions: 95,
        lines: 95,
      },
      reporter: ['text', 'text-summary'],
    },
  },
});
