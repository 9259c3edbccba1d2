import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packages = ['types', 'keys', 'cli'];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@sigil/${pkg}`] = fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: { alias },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/cli/src/main.ts'],
      reporter: ['text', 'text-summary'],
    },
  },
});
