/**
 * tagkit/localized-error
 *
 * Errors as an instance dictionary. A tagged error is its raw error, so it is
 * thrown and caught like one; the lift adds reading its descriptions through
 * the raw instance and recognizing a caught value as the tagged type.
 *
 * @example
 * ```typescript
 * import { LocalizedError } from 'tagkit/localized-error';
 *
 * const Timeout = tagger<"Timeout", Error>();
 * const TimeoutError = LocalizedError.tagged(Timeout, LocalizedError.error);
 *
 * try {
 *   throw Timeout(new Error("upstream did not answer"));
 * } catch (caught) {
 *   const timeout = TimeoutError.from(caught);
 *   if (timeout) TimeoutError.errorDescription(timeout); // "upstream did not answer"
 * }
 * ```
 */

import type { Tagged, Tagger } from "../tagged";

// =============================================================================
// Types
// =============================================================================

/**
 * What an error says about itself. Only `errorDescription` is always present.
 */
export interface ErrorDescription<A> {
  readonly errorDescription: (self: A) => string;
  readonly failureReason: (self: A) => string | undefined;
  readonly helpAnchor: (self: A) => string | undefined;
  readonly recoverySuggestion: (self: A) => string | undefined;
  readonly cause: (self: A) => unknown;
}

export interface LocalizedError<A> extends ErrorDescription<A> {
  /** Recognizes a caught value as an `A`. */
  readonly refine: (value: unknown) => value is A;
}

/**
 * The lifted instance. The tag cannot be seen at runtime, so `from` trusts
 * the raw type: any caught `Raw` is taken to carry `Tag`.
 */
export interface TaggedLocalizedError<Tag, Raw> extends ErrorDescription<Tagged<Tag, Raw>> {
  readonly from: (value: unknown) => Tagged<Tag, Raw> | undefined;
}

// =============================================================================
// Instances
// =============================================================================

const stringField = (self: Error, key: string): string | undefined => {
  const value: unknown = Reflect.get(self, key);
  return typeof value === "string" ? value : undefined;
};

/**
 * Errors of one class. `failureReason`, `helpAnchor` and
 * `recoverySuggestion` are read from string properties of the same name.
 */
export const ofClass = <E extends Error>(
  ErrorClass: abstract new (...args: never[]) => E
): LocalizedError<E> => ({
  refine: (value): value is E => value instanceof ErrorClass,
  errorDescription: (self) => self.message,
  failureReason: (self) => stringField(self, "failureReason"),
  helpAnchor: (self) => stringField(self, "helpAnchor"),
  recoverySuggestion: (self) => stringField(self, "recoverySuggestion"),
  cause: (self) => self.cause,
});

export const error: LocalizedError<Error> = ofClass(Error);

// =============================================================================
// Lift
// =============================================================================

export const tagged = <Tag, Raw>(
  T: Tagger<Tag, Raw>,
  L: LocalizedError<Raw>
): TaggedLocalizedError<Tag, Raw> => ({
  from: (value) => (L.refine(value) ? T(value) : undefined),
  errorDescription: (self) => L.errorDescription(T.unwrap(self)),
  failureReason: (self) => L.failureReason(T.unwrap(self)),
  helpAnchor: (self) => L.helpAnchor(T.unwrap(self)),
  recoverySuggestion: (self) => L.recoverySuggestion(T.unwrap(self)),
  cause: (self) => L.cause(T.unwrap(self)),
});

export const LocalizedError = {
  error,
  ofClass,
  tagged,
} as const;
