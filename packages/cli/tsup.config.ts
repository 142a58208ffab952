import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/bin.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  splitting: false,
  treeshake: true,
  // Workspace packages ship TypeScript sources
  noExternal: [/^@chainfeed\//],
});
