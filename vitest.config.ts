import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['spec/**/*.spec.ts'],
    env: {
      NODE_ENV: 'test'
    }
  },
  resolve: {
    alias: {
      '@config': fromRoot('./src/config'),
      '@database': fromRoot('./src/database'),
      '@ledger': fromRoot('./src/ledger'),
      '@routes': fromRoot('./src/routes'),
      '@services': fromRoot('./src/services'),
      '@shared': fromRoot('./src/types'),
      '@validation': fromRoot('./src/validation'),
    },
  },
});
