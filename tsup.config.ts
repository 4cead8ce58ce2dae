import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  splitting: false,
  dts: true,
  sourcemap: false,
  clean: true,
  outExtension: () => ({
    js: '.js',
  }),
});
