import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: ['src/index.ts', 'src/bin.ts'],
    format: ['esm'],
    outDir: 'dist',
    sourcemap: true,
    dts: true,
    splitting: true,
    // Workspace packages export TypeScript sources
    noExternal: ['@dhcp-lease/wire'],
  },
]);
