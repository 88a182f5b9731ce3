import { defineConfig } from 'vite';
import { fileURLToPath } from 'url';
import dts from 'vite-plugin-dts';

export default defineConfig({
  plugins: [
    dts({
      include: ['src'],
      outDir: 'dist',
      rollupTypes: true,
    }),
  ],
  build: {
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      name: 'Dayline',
      formats: ['es', 'cjs'],
      fileName: (format) => `dayline.${format === 'es' ? 'js' : 'cjs'}`,
    },
    rollupOptions: {
      external: ['fs', /^node:/, '@js-temporal/polyfill'],
    },
    // Node library
    target: 'node20',
    sourcemap: true,
    minify: false,
  },
});
