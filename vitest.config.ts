import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolvePath = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: '@csp/domain', replacement: resolvePath('./packages/domain/src/index.ts') },
      { find: '@csp/config', replacement: resolvePath('./packages/config/src/index.ts') },
      { find: /^@csp\/monitor\/(.*)$/, replacement: `${resolvePath('./apps/monitor/src')}/$1` },
    ],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
