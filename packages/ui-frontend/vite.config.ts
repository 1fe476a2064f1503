import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

// public/contracts/ holds the records written by `npm run deploy`
export default defineConfig({
  plugins: [react()],
  server: {
    port: 5173,
  },
  build: {
    outDir: 'dist',
    sourcemap: true,
  },
});
