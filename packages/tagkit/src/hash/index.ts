/**
 * tagkit/hash
 *
 * Hashing as an instance dictionary. A hash reduces a value to a `HashKey`, a
 * primitive usable as a `Map` or `Set` key, and agrees with the instance's
 * equality: equal values have equal keys.
 *
 * @example
 * ```typescript
 * import { Hash } from 'tagkit/hash';
 *
 * const UserId = tagger<"UserId", number>();
 * const UserIdHash = Hash.tagged(UserId, Hash.number);
 *
 * const names = new Map<HashKey, string>();
 * names.set(UserIdHash.hash(UserId(1)), "ada");
 * names.get(UserIdHash.hash(UserId(1))); // "ada"
 * ```
 */

import type { Tagged, Tagger } from "../tagged";
import type { Equivalence } from "../equivalence";

// =============================================================================
// Types
// =============================================================================

export type HashKey = string | number | bigint | boolean | symbol;

export interface Hash<A> extends Equivalence<A> {
  readonly hash: (self: A) => HashKey;
}

// =============================================================================
// Instances
// =============================================================================

const identity = <A extends HashKey>(): Hash<A> => ({
  equals: (self, that) => self === that,
  hash: (self) => self,
});

/** `-0` and `+0` are equal, and share the key `0` through `Map`'s SameValueZero. */
export const number: Hash<number> = identity();
export const bigint: Hash<bigint> = identity();
export const string: Hash<string> = identity();
export const boolean: Hash<boolean> = identity();
export const symbol: Hash<symbol> = identity();

/**
 * Hash through the value's own `equals` and `hashCode` methods.
 */
export const fromMethods = <
  A extends { equals(that: A): boolean; hashCode(): HashKey },
>(): Hash<A> => ({
  equals: (self, that) => self.equals(that),
  hash: (self) => self.hashCode(),
});

// =============================================================================
// Lift
// =============================================================================

/**
 * Hash of tagged values: the raw value's hash. The tag contributes nothing.
 */
export const tagged = <Tag, Raw>(
  T: Tagger<Tag, Raw>,
  H: Hash<Raw>
): Hash<Tagged<Tag, Raw>> => ({
  equals: (self, that) => H.equals(T.unwrap(self), T.unwrap(that)),
  hash: (self) => H.hash(T.unwrap(self)),
});

export const Hash = {
  number,
  bigint,
  string,
  boolean,
  symbol,
  fromMethods,
  tagged,
} as const;
