import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const src = (dir: string) => fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared': src('shared'),
      '@core': src('escrow-core'),
      '@api': src('escrow-api'),
      '@db': src('db'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
