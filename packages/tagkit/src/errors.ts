/**
 * tagkit/errors
 *
 * Errors raised by the built-in raw capability instances and the JSON coding
 * adapter. Tagging never adds an error kind: when a forwarded
 * operation fails, the raw instance's error surfaces unchanged.
 *
 * @example
 * ```typescript
 * import { isDecodingError } from 'tagkit/errors';
 *
 * try {
 *   decodeJson('"abc"', UserId);
 * } catch (error) {
 *   if (isDecodingError(error)) console.error(error.kind, error.codingPath);
 * }
 * ```
 */

import { TaggedError } from "./tagged-error";

/** A key in a coding path: an object key or an array offset. */
export type CodingKey = string | number;

/**
 * Render a coding path as `a.b[0]`; the empty path is `<root>`.
 */
export function formatCodingPath(path: readonly CodingKey[]): string {
  if (path.length === 0) return "<root>";
  return path
    .map((key, i) => (typeof key === "number" ? `[${key}]` : i === 0 ? key : `.${key}`))
    .join("");
}

// =============================================================================
// Coding Errors
// =============================================================================

export type DecodingErrorKind =
  | "typeMismatch"
  | "valueNotFound"
  | "keyNotFound"
  | "dataCorrupted";

/**
 * Raised by a decoder when the input does not have the shape a decodable
 * expects.
 *
 * @example
 * ```typescript
 * const error = new DecodingError("typeMismatch", ["id"], "expected number but found string");
 * console.log(error.message); // "DecodingError: typeMismatch at id: expected number but found string"
 * ```
 */
export class DecodingError extends TaggedError("DecodingError") {
  constructor(
    readonly kind: DecodingErrorKind,
    readonly codingPath: readonly CodingKey[],
    readonly debugDescription: string,
    options?: { cause?: unknown }
  ) {
    super(
      `DecodingError: ${kind} at ${formatCodingPath(codingPath)}: ${debugDescription}`,
      options
    );
  }
}

export type EncodingErrorKind = "invalidValue";

/**
 * Raised by an encoder when a value cannot be represented in the output.
 */
export class EncodingError extends TaggedError("EncodingError") {
  constructor(
    readonly kind: EncodingErrorKind,
    readonly codingPath: readonly CodingKey[],
    readonly debugDescription: string,
    options?: { cause?: unknown }
  ) {
    super(
      `EncodingError: ${kind} at ${formatCodingPath(codingPath)}: ${debugDescription}`,
      options
    );
  }
}

// =============================================================================
// Literal Errors
// =============================================================================

/**
 * Raised when an integer literal is not exactly representable by the raw type.
 */
export class LiteralOverflowError extends TaggedError("LiteralOverflowError") {
  constructor(
    readonly literal: number | bigint,
    readonly target: string
  ) {
    super(`LiteralOverflowError: ${String(literal)} is not exactly representable as ${target}`);
  }
}

/**
 * Raised when a character or scalar literal is not exactly one unit.
 */
export class InvalidLiteralError extends TaggedError("InvalidLiteralError") {
  constructor(
    readonly literal: string,
    readonly expected: "unicodeScalar" | "character"
  ) {
    super(`InvalidLiteralError: ${JSON.stringify(literal)} is not a single ${expected}`);
  }
}

// =============================================================================
// Collection Errors
// =============================================================================

/**
 * Raised when a collection position lies outside `startIndex..<endIndex`.
 */
export class IndexOutOfRangeError extends TaggedError("IndexOutOfRangeError") {
  constructor(
    readonly position: unknown,
    readonly endIndex: unknown
  ) {
    super(`IndexOutOfRangeError: position ${String(position)} is outside 0..<${String(endIndex)}`);
  }
}

// =============================================================================
// Union Type
// =============================================================================

export type TagkitError =
  | DecodingError
  | EncodingError
  | LiteralOverflowError
  | InvalidLiteralError
  | IndexOutOfRangeError;

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a DecodingError.
 */
export function isDecodingError(error: unknown): error is DecodingError {
  return error instanceof DecodingError;
}

/**
 * Check if an error is an EncodingError.
 */
export function isEncodingError(error: unknown): error is EncodingError {
  return error instanceof EncodingError;
}

/**
 * Check if an error is a LiteralOverflowError.
 */
export function isLiteralOverflowError(error: unknown): error is LiteralOverflowError {
  return error instanceof LiteralOverflowError;
}

/**
 * Check if an error is an InvalidLiteralError.
 */
export function isInvalidLiteralError(error: unknown): error is InvalidLiteralError {
  return error instanceof InvalidLiteralError;
}

/**
 * Check if an error is an IndexOutOfRangeError.
 */
export function isIndexOutOfRangeError(error: unknown): error is IndexOutOfRangeError {
  return error instanceof IndexOutOfRangeError;
}

/**
 * Check if an error is any TagkitError.
 */
export function isTagkitError(error: unknown): error is TagkitError {
  if (!TaggedError.isTaggedError(error)) return false;
  return [
    "DecodingError",
    "EncodingError",
    "LiteralOverflowError",
    "InvalidLiteralError",
    "IndexOutOfRangeError",
  ].includes(error._tag);
}
