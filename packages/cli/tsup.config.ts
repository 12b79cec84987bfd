import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  noExternal: ['@pubsync/core'],
  external: ['better-sqlite3', 'mysql2', '@elastic/elasticsearch'],
  publicDir: '../core/mappings',
  banner: { js: '#!/usr/bin/env node' },
});
