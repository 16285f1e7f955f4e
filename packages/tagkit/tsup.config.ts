import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (namespace + named exports)
    index: 'src/index.ts',

    // =========================================================================
    // Equality, ordering, hashing
    // =========================================================================
    equivalence: 'src/equivalence/index.ts',
    order: 'src/order/index.ts',
    hash: 'src/hash/index.ts',

    // =========================================================================
    // Arithmetic
    // =========================================================================
    'additive-arithmetic': 'src/additive-arithmetic/index.ts',
    'floating-point': 'src/floating-point/index.ts',
    'binary-floating-point': 'src/binary-floating-point/index.ts',

    // =========================================================================
    // Iteration & strides
    // =========================================================================
    sequence: 'src/sequence/index.ts',
    strideable: 'src/strideable/index.ts',

    // =========================================================================
    // Literals, text, coding
    // =========================================================================
    literal: 'src/literal/index.ts',
    'lossless-string': 'src/lossless-string/index.ts',
    codable: 'src/codable/index.ts',
    'codable/json': 'src/codable/json.ts',
    'localized-error': 'src/localized-error/index.ts',

    // =========================================================================
    // Utility entry points
    // =========================================================================
    presets: 'src/presets.ts',
    errors: 'src/errors-entry.ts',
    result: 'src/result.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
