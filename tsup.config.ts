import { defineConfig } from 'tsup'

export default defineConfig({
  clean: true,
  entry: { cli: 'apps/cli/src/main.ts' },
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  banner: { js: '#!/usr/bin/env node' }
})
