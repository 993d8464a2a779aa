import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**', '**/node_modules/**'],
    environment: 'node',
    // Fixed process defaults for every test file
    env: {
      MONETA_DEFAULT_CURRENCY: 'XYZ',
      MONETA_DEFAULT_LOCALE: 'DEFAULT',
    },
  },
});
