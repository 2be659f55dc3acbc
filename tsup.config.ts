import { defineConfig } from 'tsup'

export default defineConfig([
  // Library build (CJS + ESM); terms.json is inlined by the bundler
  {
    entry: { index: 'src/index.ts' },
    format: ['cjs', 'esm'],
    dts: true,
    clean: true,
    outDir: 'dist',
    splitting: false,
    sourcemap: true,
    target: 'node20',
    platform: 'node',
    outExtension({ format }) {
      return { js: format === 'cjs' ? '.cjs' : '.mjs' }
    },
  },
  // lunar-phase CLI (CJS only, with shebang)
  {
    entry: { cli: 'src/cli/index.ts' },
    format: ['cjs'],
    dts: false,
    outDir: 'dist',
    splitting: false,
    sourcemap: false,
    target: 'node20',
    platform: 'node',
    banner: {
      js: '#!/usr/bin/env node',
    },
    outExtension() {
      return { js: '.cjs' }
    },
  },
])
