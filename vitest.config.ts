import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared': fromRoot('./src/shared'),
      '@core': fromRoot('./src/claims-core'),
      '@api': fromRoot('./src/claims-api'),
      '@db': fromRoot('./src/db'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
