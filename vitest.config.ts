import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    watch: false,
    fileParallelism: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules'],
  },
  resolve: {
    alias: {
      'casebook': root('./packages/core/src/index.ts'),
      '@casebook/reporter-allure': root('./packages/reporter-allure/src/index.ts'),
    },
  },
});
