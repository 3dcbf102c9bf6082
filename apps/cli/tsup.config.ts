import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  banner: {
    js: '#!/usr/bin/env node',
  },
  clean: false,
  noExternal: ['@contents-generator/generation-core', '@contents-generator/shell'],
});
