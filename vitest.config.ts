import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@taskpilot/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    projects: [
      {
        extends: true,
        test: { name: 'core', root: './packages/core', include: ['tests/**/*.test.ts'], environment: 'node' },
      },
      {
        extends: true,
        test: { name: 'cli', root: './packages/cli', include: ['tests/**/*.test.ts'], environment: 'node' },
      },
    ],
    passWithNoTests: true,
  },
});
