import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@pbr\/config$/, replacement: fromRoot('./packages/config/src/index.ts') },
      { find: /^@pbr\/config\/(.*)$/, replacement: `${fromRoot('./packages/config/src')}/$1` },
      { find: /^@pbr\/domain$/, replacement: fromRoot('./packages/domain/src/index.ts') },
      { find: /^@pbr\/domain\/(.*)$/, replacement: `${fromRoot('./packages/domain/src')}/$1` },
      { find: /^@pbr\/relay\/(.*)$/, replacement: `${fromRoot('./apps/relay/src')}/$1` },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts', 'apps/*/test/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
