import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    root: './',
    include: ['src/**/*.spec.ts', 'test/**/*.spec.ts'],
    testTimeout: 10000,
  },
  plugins: [
    // Nest decorators need the metadata SWC emits
    swc.vite({
      module: { type: 'es6' },
    }),
  ],
});
