import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  target: 'node20',
  outDir: 'dist',
  splitting: false,
  external: [
    // All dependencies should be external for CLI tool
    'chalk',
    'commander',
    'papaparse',
    'remark',
    'zod'
  ]
});
