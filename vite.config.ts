import { defineConfig } from 'vite';
import { resolve } from 'path';
import dts from 'vite-plugin-dts';

export default defineConfig(({ mode }) => ({
  plugins: [
    dts({
      include: ['src'],
      outDir: 'dist',
      rollupTypes: true,
    }),
  ],
  build: {
    lib: {
      entry: resolve(__dirname, 'src/index.ts'),
      name: 'EventStackChart',
      formats: ['es', 'umd'],
      fileName: (format) => `event-stack-chart.${format === 'es' ? 'js' : 'umd.cjs'}`,
    },
    rollupOptions: {
      external: ['@js-temporal/polyfill', 'd3'],
      output: {
        globals: {
          '@js-temporal/polyfill': 'temporal',
          d3: 'd3',
        },
      },
    },
    sourcemap: true,
    minify: 'esbuild',
  },
  define: {
    // Feature flags - true in dev mode, false in production builds
    __DEBUG__: mode !== 'production',
  },
}));
