import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',   // @relpack/core - modules as namespaces
    'src/fs.ts',      // @relpack/core/fs - filesystem and process implementations
    'src/memory.ts',  // @relpack/core/memory - in-memory implementations
  ],
  format: ['cjs'],
  dts: true,
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  splitting: false,
  treeshake: true,
});
