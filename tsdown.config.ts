import { defineConfig } from 'tsdown'

export default defineConfig([
  // CLI binary: dist/cli.mjs (standalone)
  // noExternal inlines the @sfpack/* workspace packages, which are private and not on npm
  {
    entry: { cli: './packages/cli/src/cli.ts' },
    format: 'esm',
    platform: 'node',
    dts: false,
    clean: true,
    outDir: 'dist',
    noExternal: [/^@sfpack\//],
  },
])
