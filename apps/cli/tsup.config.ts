import { defineConfig, type Options } from 'tsup';

/**
 * Bundles the CLI with the workspace packages inlined, since those export
 * their TypeScript sources. Third-party dependencies stay external.
 */
export const cliBuildOptions = {
  entry: ['apps/cli/src/index.ts'],
  outDir: 'apps/cli/dist',
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  clean: true,
  splitting: false,
  treeshake: true,
  noExternal: [/^@tagstore\//],
} satisfies Options;

export default defineConfig(cliBuildOptions);
