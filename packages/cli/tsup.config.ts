import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  dts: false,
  splitting: false,
  sourcemap: true,
  clean: true,
  // @depdot/core ships TypeScript sources only, so it is bundled in
  noExternal: ['@depdot/core'],
});
