import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',   // @sieve/core - pipeline, interfaces + types
    'src/fs.ts',      // @sieve/core/fs - filesystem implementations
    'src/memory.ts',  // @sieve/core/memory - in-memory implementations
  ],
  format: ['cjs'],
  dts: true,
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  // One shared chunk, so test files and the framework see the same collector
  splitting: true,
  treeshake: true,
  external: ['ajv', 'fast-glob', 'js-yaml', 'picomatch'],
});
