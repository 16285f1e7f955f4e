/**
 * tagkit/sequence
 *
 * Iteration over a raw value's elements, and positional access for
 * collections, through an instance that works for any raw type, iterable or
 * not. A tagged sequence yields the raw elements: the elements are not
 * tagged.
 *
 * @example
 * ```typescript
 * import { Sequence } from 'tagkit/sequence';
 *
 * const Tags = tagger<"Tags", string[]>();
 * const TagsSeq = Sequence.tagged(Tags, Sequence.iterable<string>());
 *
 * for (const tag of TagsSeq.elements(Tags(["a", "b"]))) console.log(tag);
 * ```
 */

import type { Tagged, Tagger } from "../tagged";
import type { Equivalence } from "../equivalence";
import { IndexOutOfRangeError } from "../errors";

// =============================================================================
// Types
// =============================================================================

export interface Sequence<A, E> {
  readonly makeIterator: (self: A) => Iterator<E>;
}

/**
 * A sequence with stable, multi-pass positions from `startIndex` up to (not
 * including) `endIndex`.
 */
export interface Collection<A, E, I = number> extends Sequence<A, E> {
  /** Equality of positions; reaching `endIndex` is detected with it. */
  readonly index: Equivalence<I>;
  readonly startIndex: (self: A) => I;
  readonly endIndex: (self: A) => I;
  readonly indexAfter: (self: A, position: I) => I;
  readonly element: (self: A, position: I) => E;
  /**
   * Every valid position in order, for instances that can list them in one
   * pass. `indices` and `count` use it in place of stepping with `indexAfter`.
   */
  readonly indices?: (self: A) => Iterable<I>;
}

export interface TaggedSequence<Tag, Raw, E> extends Sequence<Tagged<Tag, Raw>, E> {
  /** The raw value's elements, iterable any number of times. */
  readonly elements: (self: Tagged<Tag, Raw>) => Iterable<E>;
}

export interface TaggedCollection<Tag, Raw, E, I>
  extends TaggedSequence<Tag, Raw, E>,
    Collection<Tagged<Tag, Raw>, E, I> {}

// =============================================================================
// Instances
// =============================================================================

/**
 * Any JavaScript iterable, in its own iteration order.
 */
export const iterable = <E>(): Sequence<Iterable<E>, E> => ({
  makeIterator: (self) => self[Symbol.iterator](),
});

const offsets: Equivalence<number> = { equals: (self, that) => self === that };

/**
 * Arrays, indexed by offset.
 */
export const array = <E>(): Collection<ReadonlyArray<E>, E> => ({
  index: offsets,
  makeIterator: (self) => self[Symbol.iterator](),
  startIndex: () => 0,
  endIndex: (self) => self.length,
  indexAfter: (self, position) => {
    if (!Number.isInteger(position) || position < 0 || position >= self.length) {
      throw new IndexOutOfRangeError(position, self.length);
    }
    return position + 1;
  },
  element: (self, position) => {
    if (!Number.isInteger(position) || position < 0 || position >= self.length) {
      throw new IndexOutOfRangeError(position, self.length);
    }
    return self[position];
  },
});

const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

function* graphemeIterator(self: string): Generator<string, void, undefined> {
  for (const { segment } of graphemes.segment(self)) yield segment;
}

function* graphemeOffsets(self: string): Generator<number, void, undefined> {
  for (const { index } of graphemes.segment(self)) yield index;
}

function graphemeAt(self: string, position: number): Intl.SegmentData {
  const data =
    Number.isInteger(position) && position >= 0 && position < self.length
      ? graphemes.segment(self).containing(position)
      : undefined;
  if (!data) throw new IndexOutOfRangeError(position, self.length);
  return data;
}

/**
 * Strings as collections of user-perceived characters (grapheme clusters).
 * Positions are UTF-16 offsets; a position inside a cluster refers to the
 * whole cluster.
 */
export const string: Collection<string, string> = {
  index: offsets,
  makeIterator: graphemeIterator,
  startIndex: () => 0,
  endIndex: (self) => self.length,
  indexAfter: (self, position) => {
    const data = graphemeAt(self, position);
    return data.index + data.segment.length;
  },
  element: (self, position) => graphemeAt(self, position).segment,
  indices: graphemeOffsets,
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Every valid position, in order.
 */
export const indices =
  <A, E, I>(C: Collection<A, E, I>) =>
  function* (self: A): Generator<I, void, undefined> {
    if (C.indices) {
      yield* C.indices(self);
      return;
    }
    const end = C.endIndex(self);
    for (let i = C.startIndex(self); !C.index.equals(i, end); i = C.indexAfter(self, i)) {
      yield i;
    }
  };

export const count =
  <A, E, I>(C: Collection<A, E, I>) =>
  (self: A): number => {
    let n = 0;
    for (const _ of indices(C)(self)) n++;
    return n;
  };

export const isEmpty =
  <A, E, I>(C: Collection<A, E, I>) =>
  (self: A): boolean =>
    C.index.equals(C.startIndex(self), C.endIndex(self));

// =============================================================================
// Lift
// =============================================================================

export const tagged = <Tag, Raw, E>(
  T: Tagger<Tag, Raw>,
  S: Sequence<Raw, E>
): TaggedSequence<Tag, Raw, E> => ({
  makeIterator: (self) => S.makeIterator(T.unwrap(self)),
  elements: (self) => ({ [Symbol.iterator]: () => S.makeIterator(T.unwrap(self)) }),
});

export const taggedCollection = <Tag, Raw, E, I>(
  T: Tagger<Tag, Raw>,
  C: Collection<Raw, E, I>
): TaggedCollection<Tag, Raw, E, I> => {
  const rawIndices = C.indices;
  return {
    ...tagged(T, C),
    index: C.index,
    startIndex: (self) => C.startIndex(T.unwrap(self)),
    endIndex: (self) => C.endIndex(T.unwrap(self)),
    indexAfter: (self, position) => C.indexAfter(T.unwrap(self), position),
    element: (self, position) => C.element(T.unwrap(self), position),
    indices: rawIndices && ((self: Tagged<Tag, Raw>) => rawIndices(T.unwrap(self))),
  };
};

export const Sequence = {
  iterable,
  array,
  string,
  indices,
  count,
  isEmpty,
  tagged,
  taggedCollection,
} as const;
