import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { relpack: 'src/index.ts' },
  format: ['cjs'],
  platform: 'node',
  target: 'node20',
  outDir: 'dist',
  clean: true,
  // Ship the CLI as one file with the core inlined
  noExternal: ['@relpack/core'],
  banner: { js: '#!/usr/bin/env node' },
});
