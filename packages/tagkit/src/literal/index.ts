/**
 * tagkit/literal
 *
 * Building tagged values from literals. Each raw instance turns a literal
 * into a raw value, and the lifts turn it into a constructor for the tagged
 * type, so a literal can stand where a tagged value is expected:
 *
 * @example
 * ```typescript
 * import { Literal } from 'tagkit/literal';
 *
 * const UserId = tagger<"UserId", number>();
 * const userId = Literal.tagged(UserId, Literal.integerLiteral);
 * const id = userId(42);            // Tagged<"UserId", number>
 *
 * const Greeting = tagger<"Greeting", string>();
 * const greeting = Literal.taggedInterpolation(Greeting, Literal.stringInterpolation);
 * const hello = greeting`hello ${name}`;
 * ```
 */

import type { Tagged, Tagger } from "../tagged";
import { InvalidLiteralError, LiteralOverflowError } from "../errors";

// =============================================================================
// Types
// =============================================================================

export interface ExpressibleByLiteral<A, L> {
  readonly fromLiteral: (literal: L) => A;
}

export interface ExpressibleByArrayLiteral<A, E> {
  readonly fromArrayLiteral: (elements: ReadonlyArray<E>) => A;
}

export interface ExpressibleByDictionaryLiteral<A, K, V> {
  readonly fromDictionaryLiteral: (entries: ReadonlyArray<readonly [K, V]>) => A;
}

export interface ExpressibleByStringInterpolation<A> {
  readonly fromInterpolation: (strings: TemplateStringsArray, ...values: unknown[]) => A;
}

// =============================================================================
// Scalar Literals
// =============================================================================

export const booleanLiteral: ExpressibleByLiteral<boolean, boolean> = {
  fromLiteral: (literal) => literal,
};

/**
 * Integer literals as `number`. Only safe integers are exact; anything else
 * throws `LiteralOverflowError`.
 */
export const integerLiteral: ExpressibleByLiteral<number, number | bigint> = {
  fromLiteral: (literal) => {
    const value = Number(literal);
    if (!Number.isSafeInteger(value)) {
      throw new LiteralOverflowError(literal, "number");
    }
    return value;
  },
};

/** Integer literals as `bigint`; a non-integer `number` throws `RangeError`. */
export const bigintLiteral: ExpressibleByLiteral<bigint, number | bigint> = {
  fromLiteral: (literal) => BigInt(literal),
};

export const floatLiteral: ExpressibleByLiteral<number, number> = {
  fromLiteral: (literal) => literal,
};

export const stringLiteral: ExpressibleByLiteral<string, string> = {
  fromLiteral: (literal) => literal,
};

/**
 * Exactly one Unicode scalar: one code point that is not a surrogate.
 */
export const unicodeScalarLiteral: ExpressibleByLiteral<string, string> = {
  fromLiteral: (literal) => {
    const codePoints = Array.from(literal);
    const codePoint = codePoints.length === 1 ? literal.codePointAt(0) : undefined;
    if (codePoint === undefined || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      throw new InvalidLiteralError(literal, "unicodeScalar");
    }
    return literal;
  },
};

const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * Exactly one user-perceived character (grapheme cluster).
 */
export const characterLiteral: ExpressibleByLiteral<string, string> = {
  fromLiteral: (literal) => {
    if (Array.from(graphemes.segment(literal)).length !== 1) {
      throw new InvalidLiteralError(literal, "character");
    }
    return literal;
  },
};

// =============================================================================
// Collection Literals
// =============================================================================

export const arrayLiteral = <E>(): ExpressibleByArrayLiteral<E[], E> => ({
  fromArrayLiteral: (elements) => [...elements],
});

/** Duplicate elements collapse. */
export const setLiteral = <E>(): ExpressibleByArrayLiteral<Set<E>, E> => ({
  fromArrayLiteral: (elements) => new Set(elements),
});

/** A repeated key keeps its last value. */
export const mapLiteral = <K, V>(): ExpressibleByDictionaryLiteral<Map<K, V>, K, V> => ({
  fromDictionaryLiteral: (entries) => new Map(entries),
});

export const recordLiteral = <V>(): ExpressibleByDictionaryLiteral<
  Record<string, V>,
  string,
  V
> => ({
  fromDictionaryLiteral: (entries) => Object.fromEntries(entries),
});

// =============================================================================
// String Interpolation
// =============================================================================

/**
 * Template literals: each interpolated value is rendered with `String(...)`.
 */
export const stringInterpolation: ExpressibleByStringInterpolation<string> = {
  fromInterpolation: (strings, ...values) =>
    strings.reduce((out, part, i) => (i === 0 ? part : out + String(values[i - 1]) + part), ""),
};

// =============================================================================
// Lifts
// =============================================================================

export const tagged =
  <Tag, Raw, L>(T: Tagger<Tag, Raw>, E: ExpressibleByLiteral<Raw, L>) =>
  (literal: L): Tagged<Tag, Raw> =>
    T(E.fromLiteral(literal));

export const taggedArray =
  <Tag, Raw, El>(T: Tagger<Tag, Raw>, E: ExpressibleByArrayLiteral<Raw, El>) =>
  (...elements: El[]): Tagged<Tag, Raw> =>
    T(E.fromArrayLiteral(elements));

export const taggedDictionary =
  <Tag, Raw, K, V>(T: Tagger<Tag, Raw>, E: ExpressibleByDictionaryLiteral<Raw, K, V>) =>
  (...entries: Array<readonly [K, V]>): Tagged<Tag, Raw> =>
    T(E.fromDictionaryLiteral(entries));

/** A template-literal tag that builds the tagged value. */
export const taggedInterpolation =
  <Tag, Raw>(T: Tagger<Tag, Raw>, E: ExpressibleByStringInterpolation<Raw>) =>
  (strings: TemplateStringsArray, ...values: unknown[]): Tagged<Tag, Raw> =>
    T(E.fromInterpolation(strings, ...values));

export const Literal = {
  booleanLiteral,
  integerLiteral,
  bigintLiteral,
  floatLiteral,
  stringLiteral,
  unicodeScalarLiteral,
  characterLiteral,
  arrayLiteral,
  setLiteral,
  mapLiteral,
  recordLiteral,
  stringInterpolation,
  tagged,
  taggedArray,
  taggedDictionary,
  taggedInterpolation,
} as const;
