import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Tests run against segver-core's sources; its package export is the compiled dist/.
    alias: {
      'segver-core': fileURLToPath(new URL('./segver-core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['segver-core/test/**/*.test.ts', 'segver-cli/tests/**/*.test.ts'],
    globals: false,
    environment: 'node',
  },
});
