import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/core/index.ts',
    adapter: 'src/adapter/adapter.ts',
    builder: 'src/builder/builder.ts',
    client: 'src/client/client.ts',
  },
  format: ['esm', 'cjs'],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: true,
  outDir: 'dist/bundle',
  external: [/^node:/],
});
