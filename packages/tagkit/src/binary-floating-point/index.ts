/**
 * tagkit/binary-floating-point
 *
 * Radix-2 floating point: a `FloatingPoint` that also exposes its bit fields.
 *
 * @example
 * ```typescript
 * import { BinaryFloatingPoint, binary64 } from 'tagkit/binary-floating-point';
 *
 * const Seconds = tagger<"Seconds", number>();
 * const S = BinaryFloatingPoint.tagged(Seconds, binary64);
 *
 * S.exponentBitPattern(Seconds(1));  // 1023
 * S.binade(Seconds(3));              // Seconds(2)
 * ```
 */

import type { Tagged, Tagger } from "../tagged";
import {
  tagged as floatingPoint,
  type FloatingPoint,
  type FloatingPointSign,
  type TaggedFloatingPoint,
} from "../floating-point";
import { binary64 } from "./binary64";

// =============================================================================
// Types
// =============================================================================

export interface BinaryFloatingPoint<A> extends FloatingPoint<A> {
  readonly exponentBitCount: number;
  /** Fraction bits stored; the leading bit of a normal value is implicit. */
  readonly significandBitCount: number;
  readonly exponentBitPattern: (self: A) => number;
  readonly significandBitPattern: (self: A) => bigint;
  /** Build a value from raw fields; out-of-range bits are masked off. */
  readonly fromBitPattern: (
    sign: FloatingPointSign,
    exponentBitPattern: number,
    significandBitPattern: bigint
  ) => A;
  /** The signed power of two at the bottom of the value's binade. */
  readonly binade: (self: A) => A;
  /** Bits needed to represent the significand after its leading bit; -1 for zero and non-finite values. */
  readonly significandWidth: (self: A) => number;
}

export interface TaggedBinaryFloatingPoint<Tag, Raw>
  extends TaggedFloatingPoint<Tag, Raw>,
    BinaryFloatingPoint<Tagged<Tag, Raw>> {}

// =============================================================================
// Lift
// =============================================================================

export function tagged<Tag, Raw>(
  T: Tagger<Tag, Raw>,
  F: BinaryFloatingPoint<Raw>
): TaggedBinaryFloatingPoint<Tag, Raw> {
  return Object.assign(floatingPoint(T, F), {
    exponentBitCount: F.exponentBitCount,
    significandBitCount: F.significandBitCount,
    exponentBitPattern: (self: Tagged<Tag, Raw>) => F.exponentBitPattern(T.unwrap(self)),
    significandBitPattern: (self: Tagged<Tag, Raw>) => F.significandBitPattern(T.unwrap(self)),
    fromBitPattern: (sign: FloatingPointSign, exponentBits: number, significandBits: bigint) =>
      T(F.fromBitPattern(sign, exponentBits, significandBits)),
    binade: (self: Tagged<Tag, Raw>) => T(F.binade(T.unwrap(self))),
    significandWidth: (self: Tagged<Tag, Raw>) => F.significandWidth(T.unwrap(self)),
  });
}

export { binary64 };

export const BinaryFloatingPoint = {
  binary64,
  tagged,
} as const;
