/**
 * tagkit/strideable
 *
 * Values that can be offset by a stride and measured against each other. The
 * stride is not tagged: the distance between two `Timestamp`s is a plain
 * number of milliseconds, and advancing a `Timestamp` gives a `Timestamp`.
 *
 * @example
 * ```typescript
 * import { Strideable } from 'tagkit/strideable';
 *
 * const Page = tagger<"Page", number>();
 * const PageStride = Strideable.tagged(Page, Strideable.number);
 *
 * PageStride.advanced(Page(3), 2);         // Page(5)
 * PageStride.distance(Page(3), Page(10));  // 7
 * ```
 */

import type { Tagged, Tagger } from "../tagged";

// =============================================================================
// Types
// =============================================================================

export interface Strideable<A, S> {
  /** The stride `d` such that `advanced(self, d)` equals `other`. */
  readonly distance: (self: A, other: A) => S;
  readonly advanced: (self: A, by: S) => A;
}

// =============================================================================
// Instances
// =============================================================================

export const number: Strideable<number, number> = {
  distance: (self, other) => other - self,
  advanced: (self, by) => self + by,
};

export const bigint: Strideable<bigint, bigint> = {
  distance: (self, other) => other - self,
  advanced: (self, by) => self + by,
};

/** Strides are milliseconds; advancing returns a new `Date`. */
export const date: Strideable<Date, number> = {
  distance: (self, other) => other.getTime() - self.getTime(),
  advanced: (self, by) => new Date(self.getTime() + by),
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Values from `start` towards `end` (exclusive) in steps of `by`. A step that
 * does not move towards `end` yields nothing.
 */
export function* stride<A>(
  S: Strideable<A, number>,
  start: A,
  end: A,
  by: number
): Generator<A, void, undefined> {
  if (by === 0 || Number.isNaN(by)) return;
  let current = start;
  for (;;) {
    const remaining = S.distance(current, end);
    if (by > 0 ? remaining <= 0 : remaining >= 0) return;
    yield current;
    current = S.advanced(current, by);
  }
}

// =============================================================================
// Lift
// =============================================================================

export const tagged = <Tag, Raw, S>(
  T: Tagger<Tag, Raw>,
  St: Strideable<Raw, S>
): Strideable<Tagged<Tag, Raw>, S> => ({
  distance: (self, other) => St.distance(T.unwrap(self), T.unwrap(other)),
  advanced: (self, by) => T(St.advanced(T.unwrap(self), by)),
});

export const Strideable = {
  number,
  bigint,
  date,
  stride,
  tagged,
} as const;
