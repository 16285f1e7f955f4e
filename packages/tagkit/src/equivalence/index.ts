/**
 * tagkit/equivalence
 *
 * Equality as an instance dictionary. `tagged(T, E)` derives equality for a
 * tagged type from the raw type's equality: two tagged values are equal
 * exactly when their raw values are.
 *
 * @example
 * ```typescript
 * import { Equivalence } from 'tagkit/equivalence';
 *
 * const UserId = tagger<"UserId", number>();
 * const UserIdEq = Equivalence.tagged(UserId, Equivalence.number);
 *
 * UserIdEq.equals(UserId(1), UserId(1)); // true
 * ```
 */

import type { Tagged, Tagger } from "../tagged";

// =============================================================================
// Types
// =============================================================================

export interface Equivalence<A> {
  readonly equals: (self: A, that: A) => boolean;
}

// =============================================================================
// Constructors
// =============================================================================

export const make = <A>(equals: (self: A, that: A) => boolean): Equivalence<A> => ({
  equals: (self, that) => self === that || equals(self, that),
});

/**
 * Equality by `===`.
 */
export const strict = <A>(): Equivalence<A> => ({
  equals: (self, that) => self === that,
});

// =============================================================================
// Instances
// =============================================================================

/** `===`: NaN is not equal to itself, and `-0` equals `+0`. */
export const number: Equivalence<number> = strict();
export const bigint: Equivalence<bigint> = strict();
export const string: Equivalence<string> = strict();
export const boolean: Equivalence<boolean> = strict();
export const symbol: Equivalence<symbol> = strict();

/**
 * Element-wise equality of arrays of the same length.
 */
export const array = <A>(element: Equivalence<A>): Equivalence<ReadonlyArray<A>> =>
  make((self, that) => {
    if (self.length !== that.length) return false;
    for (let i = 0; i < self.length; i++) {
      if (!element.equals(self[i], that[i])) return false;
    }
    return true;
  });

/**
 * Equality through the value's own `equals` method.
 */
export const fromMethod = <A extends { equals(that: A): boolean }>(): Equivalence<A> => ({
  equals: (self, that) => self.equals(that),
});

// =============================================================================
// Lift
// =============================================================================

/**
 * Equality of tagged values: compares raw values only.
 */
export const tagged = <Tag, Raw>(
  T: Tagger<Tag, Raw>,
  E: Equivalence<Raw>
): Equivalence<Tagged<Tag, Raw>> => ({
  equals: (self, that) => E.equals(T.unwrap(self), T.unwrap(that)),
});

export const Equivalence = {
  make,
  strict,
  number,
  bigint,
  string,
  boolean,
  symbol,
  array,
  fromMethod,
  tagged,
} as const;
