/**
 * tagkit/presets
 *
 * Ready-made tagged types for the common raw types: a tagger carrying every
 * capability its raw type supports.
 *
 * @example
 * ```typescript
 * import { numberTag } from 'tagkit/presets';
 *
 * const Meters = numberTag<"Meters">();
 * type Meters = TaggedOf<typeof Meters>;
 *
 * const total = Meters.add(Meters(1.5), Meters(2));   // 3.5
 * Meters.lessThan(total, Meters(4));                  // true
 * Meters.parse("12.5");                               // 12.5
 * ```
 */

import { tagger, type Tagged, type Tagger } from "./tagged";
import { Order, type FullOrder } from "./order";
import { Hash } from "./hash";
import { AdditiveArithmetic, type TaggedAdditiveArithmetic } from "./additive-arithmetic";
import {
  BinaryFloatingPoint,
  binary64,
  type TaggedBinaryFloatingPoint,
} from "./binary-floating-point";
import { Sequence, type TaggedCollection } from "./sequence";
import { Strideable } from "./strideable";
import { Literal } from "./literal";
import { LosslessString } from "./lossless-string";
import { Codable, type CodableOptions } from "./codable";

export type PresetOptions = CodableOptions;

// =============================================================================
// number
// =============================================================================

export type NumberTag<Tag> = Tagger<Tag, number> &
  TaggedBinaryFloatingPoint<Tag, number> &
  Hash<Tagged<Tag, number>> &
  Strideable<Tagged<Tag, number>, number> &
  LosslessString<Tagged<Tag, number>> &
  Codable<Tagged<Tag, number>> & {
    readonly literal: (literal: number) => Tagged<Tag, number>;
  };

/**
 * A tagged `number` with equality, order, hashing, IEEE 754 binary64
 * arithmetic, strides, literals, lossless text and coding.
 */
export function numberTag<Tag>(options: PresetOptions = {}): NumberTag<Tag> {
  const T = tagger<Tag, number>();
  return Object.assign(T, {
    ...Hash.tagged(T, Hash.number),
    ...Strideable.tagged(T, Strideable.number),
    ...LosslessString.tagged(T, LosslessString.number),
    ...Codable.tagged(T, Codable.number, options),
    literal: Literal.tagged(T, Literal.floatLiteral),
    ...BinaryFloatingPoint.tagged(T, binary64),
  });
}

// =============================================================================
// bigint
// =============================================================================

export type BigintTag<Tag> = Tagger<Tag, bigint> &
  FullOrder<Tagged<Tag, bigint>> &
  Hash<Tagged<Tag, bigint>> &
  TaggedAdditiveArithmetic<Tag, bigint> &
  Strideable<Tagged<Tag, bigint>, bigint> &
  LosslessString<Tagged<Tag, bigint>> &
  Codable<Tagged<Tag, bigint>> & {
    readonly literal: (literal: number | bigint) => Tagged<Tag, bigint>;
  };

/**
 * A tagged `bigint` with equality, order, hashing, addition, strides,
 * literals, lossless text and coding (as a decimal string).
 */
export function bigintTag<Tag>(options: PresetOptions = {}): BigintTag<Tag> {
  const T = tagger<Tag, bigint>();
  return Object.assign(T, {
    ...Order.tagged(T, Order.bigint),
    ...Hash.tagged(T, Hash.bigint),
    ...Strideable.tagged(T, Strideable.bigint),
    ...LosslessString.tagged(T, LosslessString.bigint),
    ...Codable.tagged(T, Codable.bigint, options),
    literal: Literal.tagged(T, Literal.bigintLiteral),
    ...AdditiveArithmetic.tagged(T, AdditiveArithmetic.bigint),
  });
}

// =============================================================================
// string
// =============================================================================

export type StringTag<Tag> = Tagger<Tag, string> &
  FullOrder<Tagged<Tag, string>> &
  Hash<Tagged<Tag, string>> &
  TaggedCollection<Tag, string, string, number> &
  LosslessString<Tagged<Tag, string>> &
  Codable<Tagged<Tag, string>> & {
    readonly literal: (literal: string) => Tagged<Tag, string>;
    readonly interpolate: (strings: TemplateStringsArray, ...values: unknown[]) => Tagged<Tag, string>;
  };

/**
 * A tagged `string` with equality, order, hashing, grapheme-cluster
 * collection access, literals, template interpolation, lossless text and
 * coding.
 */
export function stringTag<Tag>(options: PresetOptions = {}): StringTag<Tag> {
  const T = tagger<Tag, string>();
  return Object.assign(T, {
    ...Order.tagged(T, Order.string),
    ...Hash.tagged(T, Hash.string),
    ...Sequence.taggedCollection(T, Sequence.string),
    ...LosslessString.tagged(T, LosslessString.string),
    ...Codable.tagged(T, Codable.string, options),
    literal: Literal.tagged(T, Literal.stringLiteral),
    interpolate: Literal.taggedInterpolation(T, Literal.stringInterpolation),
  });
}
