import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point
    index: 'src/index.ts',

    // =========================================================================
    // Granular entry points
    // =========================================================================
    result: 'src/result.ts',
    errors: 'src/errors-entry.ts',
    'tagged-error': 'src/tagged-error-entry.ts',
    operators: 'src/operators-entry.ts',
    strings: 'src/strings-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
