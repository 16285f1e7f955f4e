/**
 * tagkit/codable
 *
 * Encoding and decoding against an abstract `Decoder`/`Encoder`, in the style
 * of keyed, unkeyed and single-value containers. `tagged(T, C)` makes a tagged
 * value code exactly as its raw value: no wrapper object, no tag in the data.
 *
 * The lift first tries the single-value path. When that fails (the raw value
 * is structured, or the data does not match), it reports the failure to the
 * logger and decodes the raw value from the whole decoder instead; an error
 * from that second attempt propagates unchanged. Encoding mirrors this.
 *
 * @example
 * ```typescript
 * import { Codable } from 'tagkit/codable';
 * import { decodeJson, encodeJson } from 'tagkit/codable/json';
 *
 * const UserId = tagger<"UserId", number>();
 * const UserIdCodable = Codable.tagged(UserId, Codable.number);
 *
 * decodeJson("42", UserIdCodable);             // UserId(42)
 * encodeJson(UserId(42), UserIdCodable);       // "42"
 * ```
 */

import type { Tagged, Tagger } from "../tagged";
import { DecodingError, formatCodingPath, type CodingKey } from "../errors";

// =============================================================================
// Decoding Contract
// =============================================================================

export interface Decodable<A> {
  readonly decode: (decoder: Decoder) => A;
}

export interface Decoder {
  readonly codingPath: readonly CodingKey[];
  /** Where coders built on this decoder report recoverable failures. */
  readonly logger?: (message: string) => void;
  singleValueContainer(): SingleValueDecodingContainer;
  container(): KeyedDecodingContainer;
  unkeyedContainer(): UnkeyedDecodingContainer;
}

export interface SingleValueDecodingContainer {
  readonly codingPath: readonly CodingKey[];
  decodeNil(): boolean;
  decodeBoolean(): boolean;
  decodeNumber(): number;
  decodeString(): string;
  decode<A>(decodable: Decodable<A>): A;
}

export interface KeyedDecodingContainer {
  readonly codingPath: readonly CodingKey[];
  readonly allKeys: readonly string[];
  contains(key: string): boolean;
  decodeNil(key: string): boolean;
  decode<A>(decodable: Decodable<A>, key: string): A;
  /** `undefined` when the key is absent or holds nil. */
  decodeIfPresent<A>(decodable: Decodable<A>, key: string): A | undefined;
}

export interface UnkeyedDecodingContainer {
  readonly codingPath: readonly CodingKey[];
  readonly count: number;
  readonly currentIndex: number;
  readonly isAtEnd: boolean;
  /** Consumes the element only when it is nil. */
  decodeNil(): boolean;
  decode<A>(decodable: Decodable<A>): A;
}

// =============================================================================
// Encoding Contract
// =============================================================================

export interface Encodable<A> {
  readonly encode: (value: A, encoder: Encoder) => void;
}

export interface Encoder {
  readonly codingPath: readonly CodingKey[];
  readonly logger?: (message: string) => void;
  singleValueContainer(): SingleValueEncodingContainer;
  container(): KeyedEncodingContainer;
  unkeyedContainer(): UnkeyedEncodingContainer;
}

export interface SingleValueEncodingContainer {
  readonly codingPath: readonly CodingKey[];
  encodeNil(): void;
  encodeBoolean(value: boolean): void;
  encodeNumber(value: number): void;
  encodeString(value: string): void;
  encode<A>(encodable: Encodable<A>, value: A): void;
}

export interface KeyedEncodingContainer {
  readonly codingPath: readonly CodingKey[];
  encodeNil(key: string): void;
  encode<A>(encodable: Encodable<A>, value: A, key: string): void;
  /** Writes nothing when `value` is `undefined`. */
  encodeIfPresent<A>(encodable: Encodable<A>, value: A | undefined, key: string): void;
}

export interface UnkeyedEncodingContainer {
  readonly codingPath: readonly CodingKey[];
  readonly count: number;
  encodeNil(): void;
  encode<A>(encodable: Encodable<A>, value: A): void;
}

export interface Codable<A> extends Decodable<A>, Encodable<A> {}

// =============================================================================
// Instances
// =============================================================================

export const boolean: Codable<boolean> = {
  decode: (decoder) => decoder.singleValueContainer().decodeBoolean(),
  encode: (value, encoder) => encoder.singleValueContainer().encodeBoolean(value),
};

export const number: Codable<number> = {
  decode: (decoder) => decoder.singleValueContainer().decodeNumber(),
  encode: (value, encoder) => encoder.singleValueContainer().encodeNumber(value),
};

export const string: Codable<string> = {
  decode: (decoder) => decoder.singleValueContainer().decodeString(),
  encode: (value, encoder) => encoder.singleValueContainer().encodeString(value),
};

/**
 * `bigint` as a decimal string, since JSON numbers lose precision past 2^53.
 */
export const bigint: Codable<bigint> = {
  decode: (decoder) => {
    const text = decoder.singleValueContainer().decodeString();
    if (!/^-?\d+$/.test(text)) {
      throw new DecodingError(
        "dataCorrupted",
        decoder.codingPath,
        `expected a decimal integer but found ${JSON.stringify(text)}`
      );
    }
    return BigInt(text);
  },
  encode: (value, encoder) => encoder.singleValueContainer().encodeString(value.toString()),
};

export const array = <A>(element: Codable<A>): Codable<A[]> => ({
  decode: (decoder) => {
    const container = decoder.unkeyedContainer();
    const out: A[] = [];
    while (!container.isAtEnd) out.push(container.decode(element));
    return out;
  },
  encode: (value, encoder) => {
    const container = encoder.unkeyedContainer();
    for (const item of value) container.encode(element, item);
  },
});

/**
 * A value that may be nil. Decodes nil as `null`.
 */
export const nullable = <A>(inner: Codable<A>): Codable<A | null> => ({
  decode: (decoder) =>
    decoder.singleValueContainer().decodeNil() ? null : inner.decode(decoder),
  encode: (value, encoder) => {
    if (value === null) encoder.singleValueContainer().encodeNil();
    else inner.encode(value, encoder);
  },
});

// =============================================================================
// Lift
// =============================================================================

export interface CodableOptions {
  /** Receives the single-value failure before the fallback runs. */
  logger?: (message: string) => void;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Code a tagged value exactly as its raw value.
 *
 * Without a `logger` option, failures go to the decoder's or encoder's own
 * logger, if it has one.
 */
export function tagged<Tag, Raw>(
  T: Tagger<Tag, Raw>,
  C: Codable<Raw>,
  options: CodableOptions = {}
): Codable<Tagged<Tag, Raw>> {
  const { logger } = options;

  return {
    decode: (decoder) => {
      let raw: Raw;
      try {
        raw = decoder.singleValueContainer().decode(C);
      } catch (error) {
        (logger ?? decoder.logger)?.(
          `single-value decode failed at ${formatCodingPath(decoder.codingPath)}, decoding from the whole decoder: ${describeError(error)}`
        );
        raw = C.decode(decoder);
      }
      return T(raw);
    },
    encode: (value, encoder) => {
      const raw = T.unwrap(value);
      try {
        encoder.singleValueContainer().encode(C, raw);
      } catch (error) {
        (logger ?? encoder.logger)?.(
          `single-value encode failed at ${formatCodingPath(encoder.codingPath)}, encoding into the whole encoder: ${describeError(error)}`
        );
        C.encode(raw, encoder);
      }
    },
  };
}

export const Codable = {
  boolean,
  number,
  string,
  bigint,
  array,
  nullable,
  tagged,
} as const;
