import { defineConfig } from 'tsup';

export default defineConfig({
  // Entry points - what to build
  entry: {
    cli: 'src/cli/index.ts',      // CLI entry -> dist/cli.js
    index: 'src/index.ts',         // Library entry -> dist/index.js
  },

  // Output format - ESM for modern Node.js
  format: ['esm'],

  // Generate TypeScript declaration files
  dts: true,

  // Enable source maps for debugging
  sourcemap: true,

  // Clean dist/ before each build
  clean: true,

  // Target Node.js 20
  target: 'node20',

  // Add shebang so dist/cli.js is directly executable
  banner: {
    js: '#!/usr/bin/env node',
  },

  // Dependencies are installed via npm, not bundled
  external: [
    'commander', 'chalk', 'zod', 'dotenv', 'express',
    /^@opentelemetry\//,
  ],
});
