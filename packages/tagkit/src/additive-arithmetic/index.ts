/**
 * tagkit/additive-arithmetic
 *
 * Addition and subtraction with a zero. Both operands of a lifted operation
 * share one tag, so `UserId + OrderId` does not type-check.
 *
 * @example
 * ```typescript
 * import { AdditiveArithmetic } from 'tagkit/additive-arithmetic';
 *
 * const Cents = tagger<"Cents", bigint>();
 * const CentsArith = AdditiveArithmetic.tagged(Cents, AdditiveArithmetic.bigint);
 *
 * let total = CentsArith.add(Cents(250n), Cents(199n)); // 449n
 * total = CentsArith.addAssign(total, Cents(1n));        // 450n
 * ```
 */

import type { Tagged, Tagger } from "../tagged";

// =============================================================================
// Types
// =============================================================================

export interface AdditiveArithmetic<A> {
  readonly zero: A;
  readonly add: (self: A, that: A) => A;
  readonly subtract: (self: A, that: A) => A;
}

/**
 * The lifted instance, with the compound-assignment forms. A tagged value is
 * its raw value, so these return the replacement for `self` rather than
 * changing it: `x = A.addAssign(x, y)`.
 */
export interface TaggedAdditiveArithmetic<Tag, Raw>
  extends AdditiveArithmetic<Tagged<Tag, Raw>> {
  readonly addAssign: (self: Tagged<Tag, Raw>, that: Tagged<Tag, Raw>) => Tagged<Tag, Raw>;
  readonly subtractAssign: (self: Tagged<Tag, Raw>, that: Tagged<Tag, Raw>) => Tagged<Tag, Raw>;
}

// =============================================================================
// Instances
// =============================================================================

export const number: AdditiveArithmetic<number> = {
  zero: 0,
  add: (self, that) => self + that,
  subtract: (self, that) => self - that,
};

export const bigint: AdditiveArithmetic<bigint> = {
  zero: 0n,
  add: (self, that) => self + that,
  subtract: (self, that) => self - that,
};

// =============================================================================
// Lift
// =============================================================================

/**
 * Arithmetic on tagged values: unwrap both operands, apply the raw operation,
 * re-tag the result.
 */
export const tagged = <Tag, Raw>(
  T: Tagger<Tag, Raw>,
  A: AdditiveArithmetic<Raw>
): TaggedAdditiveArithmetic<Tag, Raw> => {
  const add = (self: Tagged<Tag, Raw>, that: Tagged<Tag, Raw>) =>
    T(A.add(T.unwrap(self), T.unwrap(that)));
  const subtract = (self: Tagged<Tag, Raw>, that: Tagged<Tag, Raw>) =>
    T(A.subtract(T.unwrap(self), T.unwrap(that)));
  return {
    zero: T(A.zero),
    add,
    subtract,
    addAssign: add,
    subtractAssign: subtract,
  };
};

export const AdditiveArithmetic = {
  number,
  bigint,
  tagged,
} as const;
