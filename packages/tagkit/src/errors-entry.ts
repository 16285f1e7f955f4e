/**
 * tagkit/errors entry point
 *
 * The errors raised by the built-in instances and the JSON coder, and the
 * `TaggedError` factory they are built with.
 */
export {
  // Factory
  TaggedError,
  type TaggedErrorBase,
  type TaggedErrorOptions,
  type TagOf as ErrorTagOf,
  type ErrorByTag,
} from "./tagged-error";

export {
  // Errors
  DecodingError,
  EncodingError,
  LiteralOverflowError,
  InvalidLiteralError,
  IndexOutOfRangeError,
  // Coding paths
  formatCodingPath,
  type CodingKey,
  type DecodingErrorKind,
  type EncodingErrorKind,
  // Union type
  type TagkitError,
  // Type guards
  isDecodingError,
  isEncodingError,
  isLiteralOverflowError,
  isInvalidLiteralError,
  isIndexOutOfRangeError,
  isTagkitError,
} from "./errors";
