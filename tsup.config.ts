import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { index: 'src/index.ts', cli: 'src/cli/index.ts' },
  dts: { entry: { index: 'src/index.ts' } },
  sourcemap: true,
  clean: true,
  format: ['esm', 'cjs'],
  target: 'node20',
  treeshake: true,
  minify: false,
  outDir: 'dist',
  outExtension({ format }) {
    // index.mjs / index.cjs, matching package.json
    return { js: format === 'cjs' ? '.cjs' : '.mjs' };
  },
});
