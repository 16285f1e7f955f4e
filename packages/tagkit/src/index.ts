/**
 * tagkit
 *
 * Tagged values: a raw value plus a compile-time-only tag, so that
 * `Tagged<"UserId", number>` and `Tagged<"OrderId", number>` cannot be mixed
 * up. At runtime a tagged value is its raw value.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Tagkit, type TaggedOf } from 'tagkit';
 *
 * const UserId = Tagkit.tagger<"UserId", number>();
 * type UserId = TaggedOf<typeof UserId>;
 *
 * const UserIdOrder = Tagkit.Order.tagged(UserId, Tagkit.Order.number);
 * UserIdOrder.lessThan(UserId(1), UserId(2)); // true
 * ```
 *
 * A capability of the raw type is forwarded by lifting its instance with
 * `X.tagged(tagger, instance)`; the tagged type has the capability exactly
 * when such an instance exists.
 *
 * ## Entry Points
 *
 * - `tagkit` - Tagkit namespace (tagged values, every capability, presets)
 * - `tagkit/equivalence`, `tagkit/order`, `tagkit/hash` - Equality, ordering, hashing
 * - `tagkit/additive-arithmetic`, `tagkit/floating-point`,
 *   `tagkit/binary-floating-point` - Arithmetic
 * - `tagkit/sequence`, `tagkit/strideable` - Iteration, positions, strides
 * - `tagkit/literal`, `tagkit/lossless-string` - Literals and text
 * - `tagkit/codable`, `tagkit/codable/json` - Coding and the JSON coder
 * - `tagkit/localized-error` - Tagged errors and their descriptions
 * - `tagkit/presets` - `numberTag`, `bigintTag`, `stringTag`
 * - `tagkit/errors` - Error types
 */

import { tagged, tagger, unwrap } from "./tagged";
import { Equivalence } from "./equivalence";
import { Order } from "./order";
import { Hash } from "./hash";
import { AdditiveArithmetic } from "./additive-arithmetic";
import { FloatingPoint } from "./floating-point";
import { BinaryFloatingPoint } from "./binary-floating-point";
import { Sequence } from "./sequence";
import { Strideable } from "./strideable";
import { Literal } from "./literal";
import { LosslessString } from "./lossless-string";
import { Codable } from "./codable";
import { LocalizedError } from "./localized-error";
import { numberTag, bigintTag, stringTag } from "./presets";

// =============================================================================
// Tagkit namespace
// =============================================================================

const Tagkit = {
  // Tagged values
  tagged,
  tagger,
  unwrap,
  // Capabilities
  Equivalence,
  Order,
  Hash,
  AdditiveArithmetic,
  FloatingPoint,
  BinaryFloatingPoint,
  Sequence,
  Strideable,
  Literal,
  LosslessString,
  Codable,
  LocalizedError,
  // Presets
  numberTag,
  bigintTag,
  stringTag,
} as const;

export { Tagkit };

// =============================================================================
// Named value exports (tree-shake friendly)
// =============================================================================

export { tagged, tagger, unwrap } from "./tagged";
export { Equivalence } from "./equivalence";
export { Order } from "./order";
export { Hash } from "./hash";
export { AdditiveArithmetic } from "./additive-arithmetic";
export { FloatingPoint } from "./floating-point";
export { BinaryFloatingPoint, binary64 } from "./binary-floating-point";
export { Sequence } from "./sequence";
export { Strideable } from "./strideable";
export { Literal } from "./literal";
export { LosslessString } from "./lossless-string";
export { Codable } from "./codable";
export { LocalizedError } from "./localized-error";
export { numberTag, bigintTag, stringTag } from "./presets";
export { ok, err, isOk, isErr } from "./result";

// =============================================================================
// Type exports (cannot live on runtime object)
// =============================================================================

export type { TagTypeId, Brand, Tagged, Tagger, TaggedOf, RawOf, TagOf } from "./tagged";
export type { FullOrder } from "./order";
export type { HashKey } from "./hash";
export type { TaggedAdditiveArithmetic } from "./additive-arithmetic";
export type {
  FloatingPointSign,
  FloatingPointClassification,
  RoundingRule,
  TaggedFloatingPoint,
} from "./floating-point";
export type { TaggedBinaryFloatingPoint } from "./binary-floating-point";
export type { Collection, TaggedSequence, TaggedCollection } from "./sequence";
export type {
  ExpressibleByLiteral,
  ExpressibleByArrayLiteral,
  ExpressibleByDictionaryLiteral,
  ExpressibleByStringInterpolation,
} from "./literal";
export type {
  Decodable,
  Encodable,
  Decoder,
  Encoder,
  CodableOptions,
} from "./codable";
export type {
  ErrorDescription,
  TaggedLocalizedError,
} from "./localized-error";
export type { NumberTag, BigintTag, StringTag, PresetOptions } from "./presets";
export type { Ok, Err, Result } from "./result";
export type { TagkitError, CodingKey } from "./errors";
