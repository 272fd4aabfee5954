import { defineConfig } from 'vite';

export default defineConfig({
  base: process.env.BASE_URL || '/',
  build: {
    target: 'es2022',
    sourcemap: true,
  },
  server: {
    port: 5173,
    open: true,
  },
});
