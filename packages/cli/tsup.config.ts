import { defineConfig } from 'tsup'

export default defineConfig([
  {
    entry: ['src/bin.ts'],
    format: ['esm'],
    sourcemap: true,
    clean: true,
    treeshake: true,
    noExternal: ['sigwarden'],
    banner: {
      js: '#!/usr/bin/env node',
    },
  },
])
