/**
 * tagkit/tagged-error (internal)
 *
 * Error classes with a `_tag` discriminant for exhaustive matching.
 *
 * @example
 * ```typescript
 * class NotFound extends TaggedError("NotFound") {
 *   constructor(readonly id: string) {
 *     super(`NotFound: ${id}`);
 *   }
 * }
 *
 * const error = new NotFound("42");
 * error._tag; // "NotFound"
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Shape shared by every tagged error.
 */
export interface TaggedErrorBase<Tag extends string = string> extends Error {
  readonly _tag: Tag;
}

/**
 * Options forwarded to the native `Error` constructor.
 */
export type TaggedErrorOptions = {
  cause?: unknown;
};

/**
 * Extract the tag of a tagged error type.
 */
export type TagOf<E> = E extends TaggedErrorBase<infer Tag> ? Tag : never;

/**
 * Narrow a union of tagged errors to the member with the given tag.
 */
export type ErrorByTag<E, Tag extends string> = Extract<E, { readonly _tag: Tag }>;

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a base class for errors discriminated by `tag`.
 * The returned class sets `name` to the tag, so stack traces read naturally.
 */
export function TaggedError<Tag extends string>(tag: Tag) {
  return class extends Error implements TaggedErrorBase<Tag> {
    readonly _tag: Tag = tag;

    constructor(message?: string, options?: TaggedErrorOptions) {
      super(message ?? tag, options);
      this.name = tag;
    }
  };
}

/**
 * Check whether a value is a tagged error.
 */
TaggedError.isTaggedError = (value: unknown): value is TaggedErrorBase =>
  value instanceof Error &&
  "_tag" in value &&
  typeof value._tag === "string";
