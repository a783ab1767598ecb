import * as esbuild from 'esbuild';

// Build Node.js adapter (for Docker/local)
await esbuild.build({
  entryPoints: ['src/adapters/node.ts'],
  bundle: true,
  platform: 'node',
  target: 'node20',
  format: 'esm',
  outfile: 'dist/node.mjs',
  packages: 'external',
  banner: {
    js: '#!/usr/bin/env node\n// service-radar - Built with esbuild',
  },
});

console.log('Built dist/node.mjs');
