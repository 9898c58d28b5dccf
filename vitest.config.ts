import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const src = (dir?: string) =>
  fileURLToPath(new URL(dir ? `./src/${dir}` : './src', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@config': src('config'),
      '@core': src('core'),
      '@services': src('services'),
      '@utils': src('utils'),
      '@': src(),
    },
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 20_000,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true, // harness sessions are sequential by contract
      },
    },
  },
});
