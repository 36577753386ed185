import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['exact-math/tests/**/*.test.ts', 'exact-geo/tests/**/*.test.ts'],
  },
  resolve: {
    alias: {
      'exact-math': fileURLToPath(new URL('./exact-math/src/index.ts', import.meta.url)),
    },
  },
});
