import { defineConfig } from 'vitest/config';

export default defineConfig({
  define: {
    __DEBUG__: true,
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        'examples/',
        'scripts/',
        '*.config.ts',
      ],
    },
  },
});
