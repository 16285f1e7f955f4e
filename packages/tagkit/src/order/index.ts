/**
 * tagkit/order
 *
 * Strict weak ordering as an instance dictionary. An order only has to supply
 * `lessThan`; the other comparisons default to the forms derived from it, and
 * an instance may override any of them (IEEE floats do, so that comparisons
 * involving NaN stay false).
 *
 * @example
 * ```typescript
 * import { Order } from 'tagkit/order';
 *
 * const Price = tagger<"Price", number>();
 * const PriceOrder = Order.tagged(Price, Order.number);
 *
 * [Price(3), Price(1)].sort(Order.comparator(PriceOrder));
 * ```
 */

import type { Tagged, Tagger } from "../tagged";
import type { Equivalence } from "../equivalence";

// =============================================================================
// Types
// =============================================================================

export interface Order<A> extends Equivalence<A> {
  readonly lessThan: (self: A, that: A) => boolean;
  readonly lessThanOrEqualTo?: (self: A, that: A) => boolean;
  readonly greaterThan?: (self: A, that: A) => boolean;
  readonly greaterThanOrEqualTo?: (self: A, that: A) => boolean;
}

/**
 * An order with every comparison present.
 */
export interface FullOrder<A> extends Order<A> {
  readonly lessThanOrEqualTo: (self: A, that: A) => boolean;
  readonly greaterThan: (self: A, that: A) => boolean;
  readonly greaterThanOrEqualTo: (self: A, that: A) => boolean;
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * Fill in the comparisons an order leaves out.
 *
 * Defaults: `a <= b` is `!(b < a)`, `a > b` is `b < a`, `a >= b` is `!(a < b)`.
 */
export const complete = <A>(O: Order<A>): FullOrder<A> => ({
  equals: O.equals,
  lessThan: O.lessThan,
  lessThanOrEqualTo: O.lessThanOrEqualTo ?? ((self, that) => !O.lessThan(that, self)),
  greaterThan: O.greaterThan ?? ((self, that) => O.lessThan(that, self)),
  greaterThanOrEqualTo: O.greaterThanOrEqualTo ?? ((self, that) => !O.lessThan(self, that)),
});

/**
 * Order by the native relational operators.
 */
const native = <A extends number | bigint | string | Date>(): FullOrder<A> => ({
  equals: (self, that) =>
    self instanceof Date && that instanceof Date
      ? self.getTime() === that.getTime()
      : self === that,
  lessThan: (self, that) => self < that,
  lessThanOrEqualTo: (self, that) => self <= that,
  greaterThan: (self, that) => self > that,
  greaterThanOrEqualTo: (self, that) => self >= that,
});

// =============================================================================
// Instances
// =============================================================================

export const number: FullOrder<number> = native();
export const bigint: FullOrder<bigint> = native();
/** UTF-16 code unit order, as `<` compares strings. */
export const string: FullOrder<string> = native();
/** Chronological; equal when the timestamps are. */
export const date: FullOrder<Date> = native();

// =============================================================================
// Helpers
// =============================================================================

/**
 * Three-way comparison derived from `lessThan`: -1, 0 or 1.
 */
export const compare =
  <A>(O: Order<A>) =>
  (self: A, that: A): -1 | 0 | 1 =>
    O.lessThan(self, that) ? -1 : O.lessThan(that, self) ? 1 : 0;

/**
 * A comparator for `Array.prototype.sort`.
 */
export const comparator = <A>(O: Order<A>): ((self: A, that: A) => number) => compare(O);

/** The lesser of two values; the first on a tie. */
export const min =
  <A>(O: Order<A>) =>
  (self: A, that: A): A =>
    O.lessThan(that, self) ? that : self;

/** The greater of two values; the second on a tie. */
export const max =
  <A>(O: Order<A>) =>
  (self: A, that: A): A =>
    O.lessThan(that, self) ? self : that;

// =============================================================================
// Lift
// =============================================================================

/**
 * Order of tagged values: every comparison is the raw comparison. The tag
 * never breaks ties.
 */
export const tagged = <Tag, Raw>(
  T: Tagger<Tag, Raw>,
  O: Order<Raw>
): FullOrder<Tagged<Tag, Raw>> => {
  const raw = complete(O);
  return {
    equals: (self, that) => raw.equals(T.unwrap(self), T.unwrap(that)),
    lessThan: (self, that) => raw.lessThan(T.unwrap(self), T.unwrap(that)),
    lessThanOrEqualTo: (self, that) => raw.lessThanOrEqualTo(T.unwrap(self), T.unwrap(that)),
    greaterThan: (self, that) => raw.greaterThan(T.unwrap(self), T.unwrap(that)),
    greaterThanOrEqualTo: (self, that) =>
      raw.greaterThanOrEqualTo(T.unwrap(self), T.unwrap(that)),
  };
};

export const Order = {
  complete,
  number,
  bigint,
  string,
  date,
  compare,
  comparator,
  min,
  max,
  tagged,
} as const;
