import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    name: 'core',
    include: ['tests/unit/**/*.test.ts'],
    environment: 'node',
    globals: true,
    setupFiles: ['tests/shared/setup-unit.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@calldata-compress/shared': fileURLToPath(
        new URL('../shared/src/index.ts', import.meta.url)
      ),
    },
  },
});
