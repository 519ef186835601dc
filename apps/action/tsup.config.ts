import { defineConfig, type Options } from 'tsup';

/**
 * Runners check out the action without node_modules, so every dependency is
 * bundled into the single entry file action.yml points at.
 */
export const actionBuildOptions = {
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  shims: true,
  splitting: false,
  treeshake: true,
  noExternal: [/.*/],
  banner: {
    js: 'import { createRequire } from "module"; const require = createRequire(import.meta.url);',
  },
} satisfies Options;

export default defineConfig(actionBuildOptions);
