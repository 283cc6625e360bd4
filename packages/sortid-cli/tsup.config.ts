import { defineConfig } from 'tsup'

export default defineConfig({
  entry: { cli: 'src/cli.ts' },
  format: ['esm'],
  target: 'node20',
  clean: true,
  // the workspace core package ships TypeScript sources, so it is bundled in
  noExternal: ['@sortid/core'],
  banner: {
    js: '#!/usr/bin/env node',
  },
})
