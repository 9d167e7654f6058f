import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['cjs'],
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  // @sieve/core and commander stay external as dependencies
});
