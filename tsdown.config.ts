import { defineConfig } from 'tsdown'

// Tree-sitter ships native bindings and cannot be bundled
const external = [
  'tree-sitter',
  'tree-sitter-typescript',
]

export default defineConfig([
  // CLI binary: packages/cli/dist/cli.js
  // Workspace packages are private, so they are bundled inline
  {
    entry: { cli: './packages/cli/src/cli.ts' },
    format: 'esm',
    platform: 'node',
    dts: false,
    clean: true,
    outDir: 'packages/cli/dist',
    external,
    noExternal: [/^@member-order\//],
  },
])
