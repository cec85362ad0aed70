import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  clean: true,
  // docscore-core ships as TypeScript source, so it is compiled into the bundle
  noExternal: ['docscore-core'],
  // The frontmatter parser calls require() at run time; ESM output has none
  banner: {
    js: `import { createRequire as __createRequire } from 'module'; const require = __createRequire(import.meta.url);`,
  },
});
