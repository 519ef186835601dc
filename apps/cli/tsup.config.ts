import { defineConfig, type Options } from 'tsup';

export const cliBuildOptions = {
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  shims: true,
  splitting: false,
  treeshake: true,
  noExternal: [/^@commitguard\//],
  banner: {
    js: 'import { createRequire } from "module"; const require = createRequire(import.meta.url);',
  },
} satisfies Options;

export default defineConfig(cliBuildOptions);
