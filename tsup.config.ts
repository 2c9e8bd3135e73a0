import { defineConfig } from 'tsup'

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    cli: 'src/cli/index.ts',
  },
  outDir: 'dist',
  format: ['esm', 'cjs'],
  dts: { entry: 'src/index.ts' },
  clean: true,
  splitting: false,
  treeshake: true,
  sourcemap: false,
  minify: false,
  platform: 'node',
  target: 'node20',
  skipNodeModulesBundle: true,
})
