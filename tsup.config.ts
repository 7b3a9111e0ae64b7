import { defineConfig } from 'tsup';

export default defineConfig([
  // Library entry
  {
    entry: { index: 'src/index.ts' },
    format: ['esm'],
    dts: true,
    clean: true,
    sourcemap: true,
  },
  // Executables — shebang is kept from the source files
  {
    entry: {
      'cli/index': 'src/cli/index.ts',
      'mcp/server': 'src/mcp/server.ts',
    },
    format: ['esm'],
    dts: false,
    sourcemap: true,
    platform: 'node',
  },
]);
