import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import { createRuntimeLogger, resolveRuntimeConfig } from '@kpi-board/shared/node';
import { datasetApiPlugin } from './src/server/dataset-plugin.ts';

const configResult = resolveRuntimeConfig(process.env, process.cwd());
if (!configResult.ok) {
  throw new Error(configResult.error.toString());
}
const runtimeConfig = configResult.value;

export default defineConfig({
  root: fileURLToPath(new URL('.', import.meta.url)),
  plugins: [
    react(),
    datasetApiPlugin({
      preparedPath: runtimeConfig.preparedPath,
      logger: createRuntimeLogger(runtimeConfig, { module: 'dataset-api' }),
    }),
  ],
  build: {
    outDir: 'dist',
    emptyOutDir: true,
    rollupOptions: {
      output: {
        manualChunks(id) {
          if (!id.includes('node_modules')) {
            return undefined;
          }
          if (id.includes('recharts') || id.includes('d3-')) {
            return 'vendor-charts';
          }
          if (id.includes('@tanstack')) {
            return 'vendor-tanstack';
          }
          if (id.includes('zod')) {
            return 'vendor-zod';
          }
          return undefined;
        },
      },
    },
  },
});
