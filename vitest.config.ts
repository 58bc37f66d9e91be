import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared': path.resolve(__dirname, 'src/shared'),
      '@core': path.resolve(__dirname, 'src/registry-core'),
      '@api': path.resolve(__dirname, 'src/registry-api'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
  },
});
