import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/renderer/**/*.ts', 'src/utils/**/*.ts', 'src/config/**/*.ts'],
      exclude: ['**/*.test.ts', '**/*.spec.ts', 'src/demo.ts'],
    },
  },
});
