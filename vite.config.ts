import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vite';

const srcDir = fileURLToPath(new URL('./src', import.meta.url));

export default defineConfig({
  build: {
    target: 'node20',
    ssr: true,
    rollupOptions: {
      input: {
        index: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      },
      external: [
        // Node.js built-ins
        /^node:/,
        // Fastify and Google Cloud clients (don't bundle well)
        'fastify',
        '@fastify/helmet',
        /^@google-cloud\//,
        'google-auth-library',
      ],
      output: {
        format: 'es',
        entryFileNames: '[name].js',
      },
    },
    outDir: 'dist',
    emptyOutDir: true,
    minify: false,
  },
  resolve: {
    alias: {
      '@': srcDir,
    },
  },
});
