/**
 * tagkit/tagged (internal)
 *
 * The tagged value: a raw value carrying a compile-time-only tag.
 *
 * At runtime a `Tagged<"UserId", number>` IS the number: there is no wrapper
 * object, so equality, `Set`/`Map` keys, `JSON.stringify`, `String(...)` and
 * `util.inspect` all see the raw value. The tag lives in a `declare`d,
 * symbol-keyed brand that emits nothing. The brand is invariant in the tag, so
 * `Tagged<"UserId", number>` and `Tagged<"OrderId", number>` cannot be passed
 * for one another, and neither can a raw `number`.
 */

/**
 * Type-only key of the phantom brand. Never read at runtime.
 */
export declare const TagTypeId: unique symbol;
export type TagTypeId = typeof TagTypeId;

/**
 * The phantom brand. `tag` makes the tag invariant; `raw` records the raw type
 * so it can be recovered from a tagged type.
 */
export interface Brand<Tag, Raw> {
  readonly [TagTypeId]: {
    readonly tag: (tag: Tag) => Tag;
    readonly raw: Raw;
  };
}

// =============================================================================
// Tagged
// =============================================================================

/**
 * A raw value tagged with a phantom `Tag`.
 *
 * @template Tag - Marker type; only ever used at compile time
 * @template Raw - The underlying representation
 *
 * @example
 * ```typescript
 * type UserId = Tagged<"UserId", number>;
 * type OrderId = Tagged<"OrderId", number>;
 *
 * const user = tagged<"UserId", number>(1);
 * const order: OrderId = user; // type error
 * user + 1;                    // 2, a plain number
 * ```
 */
export type Tagged<Tag, Raw> = Raw & Brand<Tag, Raw>;

// =============================================================================
// Construction
// =============================================================================

/**
 * Tag a raw value. The value itself is returned unchanged.
 *
 * @example
 * ```typescript
 * const id = tagged<"UserId", number>(1);
 * id === 1; // true
 * ```
 */
export const tagged = <Tag, Raw>(rawValue: Raw): Tagged<Tag, Raw> =>
  rawValue as Tagged<Tag, Raw>;

/**
 * Forget the tag.
 */
export const unwrap = <Tag, Raw>(value: Tagged<Tag, Raw>): Raw => value;

/**
 * The definition of one tagged type: tags raw values as `Tag`, and carries the
 * operations that keep or change the tag.
 */
export interface Tagger<Tag, Raw> {
  (rawValue: Raw): Tagged<Tag, Raw>;
  wrap(rawValue: Raw): Tagged<Tag, Raw>;
  unwrap(value: Tagged<Tag, Raw>): Raw;
  /** Transform the raw value, keeping the tag. */
  map<B>(value: Tagged<Tag, Raw>, f: (rawValue: Raw) => B): Tagged<Tag, B>;
  /**
   * Re-tag a value as `Tag2`. No validation or normalization runs: the caller
   * asserts that the raw value is valid for the new tag.
   */
  unsafeCoerce<Tag2>(value: Tagged<Tag, Raw>): Tagged<Tag2, Raw>;
}

/**
 * Define a tagged type. The tagger is what capability lifts are derived from.
 *
 * @example
 * ```typescript
 * const UserId = tagger<"UserId", number>();
 * type UserId = TaggedOf<typeof UserId>;
 *
 * const id = UserId(1);
 * UserId.map(id, String);             // Tagged<"UserId", string>
 * UserId.unsafeCoerce<"OrderId">(id); // Tagged<"OrderId", number>
 * ```
 */
export function tagger<Tag, Raw>(): Tagger<Tag, Raw> {
  const wrap = (rawValue: Raw): Tagged<Tag, Raw> => tagged<Tag, Raw>(rawValue);
  return Object.assign(wrap, {
    wrap,
    unwrap: unwrap<Tag, Raw>,
    map: <B>(value: Tagged<Tag, Raw>, f: (rawValue: Raw) => B): Tagged<Tag, B> =>
      tagged<Tag, B>(f(value)),
    unsafeCoerce: <Tag2>(value: Tagged<Tag, Raw>): Tagged<Tag2, Raw> =>
      tagged<Tag2, Raw>(unwrap<Tag, Raw>(value)),
  });
}

// =============================================================================
// Type Utilities
// =============================================================================

/** The tagged type a tagger produces. */
export type TaggedOf<T> = T extends Tagger<infer Tag, infer Raw> ? Tagged<Tag, Raw> : never;

/** The raw type of a tagged type or tagger. */
export type RawOf<T> =
  T extends Brand<infer _Tag, infer Raw> ? Raw : T extends Tagger<infer _Tag, infer Raw> ? Raw : never;

/** The tag of a tagged type or tagger. */
export type TagOf<T> =
  T extends Brand<infer Tag, infer _Raw> ? Tag : T extends Tagger<infer Tag, infer _Raw> ? Tag : never;
