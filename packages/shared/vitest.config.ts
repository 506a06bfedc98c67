/**
 * Vitest configuration for the shared package
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'shared',
    environment: 'node',
    globals: true,
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    clearMocks: true,
    restoreMocks: true,
  },
});
