import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'node_modules', 'dist'],
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@mapwatch/shared': fileURLToPath(
        new URL('./src/backend/shared/src/index.ts', import.meta.url)
      ),
    },
  },
});
