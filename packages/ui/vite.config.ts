import { defineConfig } from 'vite';
import dts from 'vite-plugin-dts';

export default defineConfig({
  plugins: [dts({ rollupTypes: true })],
  build: {
    sourcemap: true,
    lib: {
      entry: 'src/index.ts',
      formats: ['es', 'cjs'],
      fileName: (format) => format === 'es' ? 'tiltcrop-ui.js' : 'tiltcrop-ui.cjs',
    },
    rollupOptions: {
      external: ['@tiltcrop/core'],
    },
  },
});
