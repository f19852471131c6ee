import { defineConfig } from 'vite';
import dts from 'vite-plugin-dts';

export default defineConfig({
  plugins: [dts({ rollupTypes: true })],
  build: {
    lib: {
      entry: 'src/index.ts',
      formats: ['es', 'cjs'],
      fileName: (format) => format === 'es' ? 'tiltcrop-react.js' : 'tiltcrop-react.cjs',
    },
    rollupOptions: {
      external: ['react', 'react/jsx-runtime', '@tiltcrop/core', '@tiltcrop/ui'],
    },
  },
});
