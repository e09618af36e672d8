import { defineConfig } from 'vite';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

/**
 * Vite config for building the ESM library bundle.
 *
 * Output: dist/stereoscreen.es.js
 *
 * WGSL sources are inlined through `?raw` imports, so the bundle carries
 * its shaders. wgpu-matrix stays external and resolves from the consumer.
 */
export default defineConfig({
  build: {
    lib: {
      entry: resolve(rootDir, 'src/index.ts'),
      name: 'Stereoscreen',
      formats: ['es'],
      fileName: () => 'stereoscreen.es.js',
    },
    outDir: 'dist',
    emptyOutDir: true,
    copyPublicDir: false,
    minify: 'esbuild',
    rollupOptions: {
      external: ['wgpu-matrix'],
    },
  },
});
