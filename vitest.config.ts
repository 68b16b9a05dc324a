import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@fixgate/common': fromRoot('./packages/common/src/index.ts'),
      '@fixgate/domain': fromRoot('./packages/domain/src/index.ts'),
      '@fixgate/fixer-client': fromRoot('./packages/fixer-client/src/index.ts')
    }
  },
  test: {
    include: ['packages/*/test/**/*.test.ts', 'services/*/test/**/*.test.ts'],
    environment: 'node'
  }
});
