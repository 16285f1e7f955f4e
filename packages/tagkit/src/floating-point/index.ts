/**
 * tagkit/floating-point
 *
 * IEEE 754 floating-point arithmetic as an instance dictionary, and its lift
 * to tagged values. Every lifted operation unwraps, calls the raw instance and
 * re-wraps under the same tag, so results (NaN propagation, signed zeros,
 * rounding) are exactly those of the raw type.
 *
 * @example
 * ```typescript
 * import { FloatingPoint } from 'tagkit/floating-point';
 * import { binary64 } from 'tagkit/binary-floating-point';
 *
 * const Meters = tagger<"Meters", number>();
 * const M = FloatingPoint.tagged(Meters, binary64);
 *
 * M.squareRoot(Meters(16));                     // 4
 * M.rounded(Meters(2.5), "toNearestOrEven");    // 2
 * ```
 */

import type { Tagged, Tagger } from "../tagged";
import type { AdditiveArithmetic, TaggedAdditiveArithmetic } from "../additive-arithmetic";
import type { Equivalence } from "../equivalence";
import type { FullOrder } from "../order";

// =============================================================================
// Types
// =============================================================================

export type FloatingPointSign = "plus" | "minus";

export type RoundingRule =
  | "toNearestOrAwayFromZero"
  | "toNearestOrEven"
  | "up"
  | "down"
  | "towardZero"
  | "awayFromZero";

export type FloatingPointClassification =
  | "signalingNaN"
  | "quietNaN"
  | "negativeInfinity"
  | "negativeNormal"
  | "negativeSubnormal"
  | "negativeZero"
  | "positiveZero"
  | "positiveSubnormal"
  | "positiveNormal"
  | "positiveInfinity";

/** The rule `rounded` uses when none is given: schoolbook rounding. */
export const defaultRoundingRule: RoundingRule = "toNearestOrAwayFromZero";

export interface FloatingPoint<A> extends AdditiveArithmetic<A>, Equivalence<A> {
  /** Same as `isLessThan`; lets the instance serve as an `Order`. */
  readonly lessThan: (self: A, that: A) => boolean;
  readonly radix: number;
  readonly nan: A;
  readonly signalingNaN: A;
  readonly infinity: A;
  readonly greatestFiniteMagnitude: A;
  readonly leastNormalMagnitude: A;
  readonly leastNonzeroMagnitude: A;
  /** Pi, rounded toward zero. */
  readonly pi: A;

  /** The closest value to an integer. */
  readonly fromInteger: (value: number | bigint) => A;
  /** The integer's value when it is exactly representable, else `undefined`. */
  readonly exactly: (value: number | bigint) => A | undefined;
  /** `(sign == minus ? -1 : 1) * significand * radix ** exponent`. */
  readonly make: (sign: FloatingPointSign, exponent: number, significand: A) => A;
  /** The magnitude of `magnitudeOf` with the sign of `signOf`. */
  readonly copySign: (signOf: A, magnitudeOf: A) => A;

  readonly magnitude: (self: A) => A;
  readonly negate: (self: A) => A;
  /** The unit in the last place. */
  readonly ulp: (self: A) => A;
  readonly sign: (self: A) => FloatingPointSign;
  readonly exponent: (self: A) => number;
  readonly significand: (self: A) => A;

  readonly multiply: (self: A, that: A) => A;
  readonly divide: (self: A, that: A) => A;
  /** IEEE remainder: the quotient is rounded to nearest, ties to even. */
  readonly remainder: (self: A, that: A) => A;
  /** The remainder of truncating division, with the sign of `self`. */
  readonly truncatingRemainder: (self: A, that: A) => A;
  readonly squareRoot: (self: A) => A;
  /** `self + lhs * rhs` with a single rounding. */
  readonly addingProduct: (self: A, lhs: A, rhs: A) => A;
  readonly nextUp: (self: A) => A;
  readonly nextDown: (self: A) => A;
  readonly rounded: (self: A, rule?: RoundingRule) => A;

  readonly isEqualTo: (self: A, that: A) => boolean;
  readonly isLessThan: (self: A, that: A) => boolean;
  readonly isLessThanOrEqualTo: (self: A, that: A) => boolean;
  /** IEEE totalOrder: `-NaN < -inf < ... < -0 < +0 < ... < +inf < +NaN`. */
  readonly isTotallyOrderedBelowOrEqualTo: (self: A, that: A) => boolean;

  readonly isNormal: (self: A) => boolean;
  readonly isFinite: (self: A) => boolean;
  readonly isZero: (self: A) => boolean;
  readonly isSubnormal: (self: A) => boolean;
  readonly isInfinite: (self: A) => boolean;
  readonly isNaN: (self: A) => boolean;
  readonly isSignalingNaN: (self: A) => boolean;
  readonly isCanonical: (self: A) => boolean;
  readonly floatingPointClass: (self: A) => FloatingPointClassification;
}

/**
 * The lifted instance: every operation of the raw instance, plus the
 * compound-assignment forms. Each of those returns the replacement for `self`
 * (`x = M.multiplyAssign(x, y)`); the receiver itself is never changed.
 */
export interface TaggedFloatingPoint<Tag, Raw>
  extends FloatingPoint<Tagged<Tag, Raw>>,
    TaggedAdditiveArithmetic<Tag, Raw>,
    FullOrder<Tagged<Tag, Raw>> {
  readonly multiplyAssign: (self: Tagged<Tag, Raw>, that: Tagged<Tag, Raw>) => Tagged<Tag, Raw>;
  readonly divideAssign: (self: Tagged<Tag, Raw>, that: Tagged<Tag, Raw>) => Tagged<Tag, Raw>;
  readonly formRemainder: (self: Tagged<Tag, Raw>, that: Tagged<Tag, Raw>) => Tagged<Tag, Raw>;
  readonly formTruncatingRemainder: (
    self: Tagged<Tag, Raw>,
    that: Tagged<Tag, Raw>
  ) => Tagged<Tag, Raw>;
  readonly formSquareRoot: (self: Tagged<Tag, Raw>) => Tagged<Tag, Raw>;
  readonly addProduct: (
    self: Tagged<Tag, Raw>,
    lhs: Tagged<Tag, Raw>,
    rhs: Tagged<Tag, Raw>
  ) => Tagged<Tag, Raw>;
  readonly round: (self: Tagged<Tag, Raw>, rule?: RoundingRule) => Tagged<Tag, Raw>;
}

// =============================================================================
// Lift
// =============================================================================

/**
 * Floating-point arithmetic on tagged values.
 */
export function tagged<Tag, Raw>(
  T: Tagger<Tag, Raw>,
  F: FloatingPoint<Raw>
): TaggedFloatingPoint<Tag, Raw> {
  type Self = Tagged<Tag, Raw>;
  const un = T.unwrap;
  const unary = (f: (x: Raw) => Raw) => (self: Self) => T(f(un(self)));
  const binary = (f: (x: Raw, y: Raw) => Raw) => (self: Self, that: Self) =>
    T(f(un(self), un(that)));
  const test = (f: (x: Raw) => boolean) => (self: Self) => f(un(self));
  const relation = (f: (x: Raw, y: Raw) => boolean) => (self: Self, that: Self) =>
    f(un(self), un(that));

  const add = binary(F.add);
  const subtract = binary(F.subtract);
  const multiply = binary(F.multiply);
  const divide = binary(F.divide);
  const remainder = binary(F.remainder);
  const truncatingRemainder = binary(F.truncatingRemainder);
  const squareRoot = unary(F.squareRoot);
  const addingProduct = (self: Self, lhs: Self, rhs: Self) =>
    T(F.addingProduct(un(self), un(lhs), un(rhs)));
  const rounded = (self: Self, rule: RoundingRule = defaultRoundingRule) =>
    T(F.rounded(un(self), rule));

  return {
    radix: F.radix,
    zero: T(F.zero),
    nan: T(F.nan),
    signalingNaN: T(F.signalingNaN),
    infinity: T(F.infinity),
    greatestFiniteMagnitude: T(F.greatestFiniteMagnitude),
    leastNormalMagnitude: T(F.leastNormalMagnitude),
    leastNonzeroMagnitude: T(F.leastNonzeroMagnitude),
    pi: T(F.pi),

    fromInteger: (value) => T(F.fromInteger(value)),
    exactly: (value) => {
      const raw = F.exactly(value);
      return raw === undefined ? undefined : T(raw);
    },
    make: (sign, exponent, significand) => T(F.make(sign, exponent, un(significand))),
    copySign: binary(F.copySign),

    magnitude: unary(F.magnitude),
    negate: unary(F.negate),
    ulp: unary(F.ulp),
    sign: (self) => F.sign(un(self)),
    exponent: (self) => F.exponent(un(self)),
    significand: unary(F.significand),

    add,
    subtract,
    multiply,
    divide,
    remainder,
    truncatingRemainder,
    squareRoot,
    addingProduct,
    nextUp: unary(F.nextUp),
    nextDown: unary(F.nextDown),
    rounded,

    addAssign: add,
    subtractAssign: subtract,
    multiplyAssign: multiply,
    divideAssign: divide,
    formRemainder: remainder,
    formTruncatingRemainder: truncatingRemainder,
    formSquareRoot: squareRoot,
    addProduct: addingProduct,
    round: rounded,

    equals: relation(F.isEqualTo),
    lessThan: relation(F.isLessThan),
    lessThanOrEqualTo: relation(F.isLessThanOrEqualTo),
    greaterThan: (self, that) => F.isLessThan(un(that), un(self)),
    greaterThanOrEqualTo: (self, that) => F.isLessThanOrEqualTo(un(that), un(self)),
    isEqualTo: relation(F.isEqualTo),
    isLessThan: relation(F.isLessThan),
    isLessThanOrEqualTo: relation(F.isLessThanOrEqualTo),
    isTotallyOrderedBelowOrEqualTo: relation(F.isTotallyOrderedBelowOrEqualTo),

    isNormal: test(F.isNormal),
    isFinite: test(F.isFinite),
    isZero: test(F.isZero),
    isSubnormal: test(F.isSubnormal),
    isInfinite: test(F.isInfinite),
    isNaN: test(F.isNaN),
    isSignalingNaN: test(F.isSignalingNaN),
    isCanonical: test(F.isCanonical),
    floatingPointClass: (self) => F.floatingPointClass(un(self)),
  };
}

export const FloatingPoint = {
  defaultRoundingRule,
  tagged,
} as const;
