/**
 * tagkit/codable/json
 *
 * A `Decoder`/`Encoder` pair over JSON values.
 *
 * A single-value container holds a JSON scalar only (`null`, a boolean, a
 * number or a string). Decoding a decodable through a single-value container
 * whose value is an object or array fails with `typeMismatch`, and encoding
 * one that asks for a keyed or unkeyed container fails with `invalidValue`,
 * leaving the output untouched.
 *
 * @example
 * ```typescript
 * import { decodeJson, encodeJson, tryDecodeJson } from 'tagkit/codable/json';
 *
 * encodeJson([1, 2], Codable.array(Codable.number));           // "[1,2]"
 * decodeJson("[1,2]", Codable.array(Codable.number));          // [1, 2]
 * tryDecodeJson("oops", Codable.number);                      // { ok: false, error: DecodingError }
 * ```
 */

import type {
  Decodable,
  Decoder,
  Encodable,
  Encoder,
  KeyedDecodingContainer,
  KeyedEncodingContainer,
  SingleValueDecodingContainer,
  SingleValueEncodingContainer,
  UnkeyedDecodingContainer,
  UnkeyedEncodingContainer,
} from "./index";
import { DecodingError, EncodingError, isDecodingError, type CodingKey } from "../errors";
import { from, type Result } from "../result";

// =============================================================================
// Types
// =============================================================================

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * How non-finite numbers are represented. JSON has no literal for them, so by
 * default encoding one throws and decoding never produces one.
 */
export type NonConformingFloatStrategy =
  | "throw"
  | {
      readonly positiveInfinity: string;
      readonly negativeInfinity: string;
      readonly nan: string;
    };

export interface JsonCodingOptions {
  /** Default: `"throw"`. */
  nonConformingFloats?: NonConformingFloatStrategy;
  /** Indentation passed to `JSON.stringify`. */
  space?: number | string;
  logger?: (message: string) => void;
}

type Settings = {
  readonly nonConformingFloats: NonConformingFloatStrategy;
  readonly logger?: (message: string) => void;
};

const settingsFrom = ({ nonConformingFloats = "throw", logger }: JsonCodingOptions): Settings => ({
  nonConformingFloats,
  logger,
});

const isJsonObject = (value: JsonValue): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function describeJson(value: JsonValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  if (typeof value === "object") return "an object";
  return `${typeof value} ${JSON.stringify(value)}`;
}

// =============================================================================
// Decoding
// =============================================================================

export class JsonDecoder implements Decoder {
  readonly logger?: (message: string) => void;

  constructor(
    readonly value: JsonValue,
    readonly codingPath: readonly CodingKey[] = [],
    private readonly settings: Settings = settingsFrom({})
  ) {
    this.logger = settings.logger;
  }

  singleValueContainer(): SingleValueDecodingContainer {
    return new JsonSingleValueDecodingContainer(this);
  }

  container(): KeyedDecodingContainer {
    if (!isJsonObject(this.value)) {
      throw this.typeMismatch("an object");
    }
    return new JsonKeyedDecodingContainer(this.value, this.codingPath, this.settings);
  }

  unkeyedContainer(): UnkeyedDecodingContainer {
    if (!Array.isArray(this.value)) {
      throw this.typeMismatch("an array");
    }
    return new JsonUnkeyedDecodingContainer(this.value, this.codingPath, this.settings);
  }

  /** @internal */
  typeMismatch(expected: string): DecodingError {
    return new DecodingError(
      this.value === null ? "valueNotFound" : "typeMismatch",
      this.codingPath,
      `expected ${expected} but found ${describeJson(this.value)}`
    );
  }

  /** @internal */
  nonConformingNumber(text: string): number | undefined {
    const strategy = this.settings.nonConformingFloats;
    if (strategy === "throw") return undefined;
    if (text === strategy.positiveInfinity) return Infinity;
    if (text === strategy.negativeInfinity) return -Infinity;
    if (text === strategy.nan) return NaN;
    return undefined;
  }
}

class JsonSingleValueDecodingContainer implements SingleValueDecodingContainer {
  readonly codingPath: readonly CodingKey[];

  constructor(private readonly decoder: JsonDecoder) {
    this.codingPath = decoder.codingPath;
  }

  decodeNil(): boolean {
    return this.decoder.value === null;
  }

  decodeBoolean(): boolean {
    const { value } = this.decoder;
    if (typeof value !== "boolean") throw this.decoder.typeMismatch("a boolean");
    return value;
  }

  decodeNumber(): number {
    const { value } = this.decoder;
    if (typeof value === "number") return value;
    if (typeof value === "string") {
      const special = this.decoder.nonConformingNumber(value);
      if (special !== undefined) return special;
    }
    throw this.decoder.typeMismatch("a number");
  }

  decodeString(): string {
    const { value } = this.decoder;
    if (typeof value !== "string") throw this.decoder.typeMismatch("a string");
    return value;
  }

  decode<A>(decodable: Decodable<A>): A {
    const { value } = this.decoder;
    if (typeof value === "object" && value !== null) {
      throw new DecodingError(
        "typeMismatch",
        this.codingPath,
        `expected a single value but found ${describeJson(value)}`
      );
    }
    return decodable.decode(this.decoder);
  }
}

class JsonKeyedDecodingContainer implements KeyedDecodingContainer {
  readonly allKeys: readonly string[];

  constructor(
    private readonly object: JsonObject,
    readonly codingPath: readonly CodingKey[],
    private readonly settings: Settings
  ) {
    this.allKeys = Object.keys(object);
  }

  contains(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.object, key);
  }

  decodeNil(key: string): boolean {
    return this.valueFor(key) === null;
  }

  decode<A>(decodable: Decodable<A>, key: string): A {
    return decodable.decode(
      new JsonDecoder(this.valueFor(key), [...this.codingPath, key], this.settings)
    );
  }

  decodeIfPresent<A>(decodable: Decodable<A>, key: string): A | undefined {
    if (!this.contains(key) || this.object[key] === null) return undefined;
    return this.decode(decodable, key);
  }

  private valueFor(key: string): JsonValue {
    if (!this.contains(key)) {
      throw new DecodingError("keyNotFound", this.codingPath, `no value associated with key "${key}"`);
    }
    return this.object[key];
  }
}

class JsonUnkeyedDecodingContainer implements UnkeyedDecodingContainer {
  currentIndex = 0;

  constructor(
    private readonly array: readonly JsonValue[],
    readonly codingPath: readonly CodingKey[],
    private readonly settings: Settings
  ) {}

  get count(): number {
    return this.array.length;
  }

  get isAtEnd(): boolean {
    return this.currentIndex >= this.array.length;
  }

  decodeNil(): boolean {
    if (this.array[this.ensureNotAtEnd()] !== null) return false;
    this.currentIndex++;
    return true;
  }

  decode<A>(decodable: Decodable<A>): A {
    const index = this.ensureNotAtEnd();
    const value = decodable.decode(
      new JsonDecoder(this.array[index], [...this.codingPath, index], this.settings)
    );
    this.currentIndex++;
    return value;
  }

  private ensureNotAtEnd(): number {
    if (this.isAtEnd) {
      throw new DecodingError(
        "valueNotFound",
        [...this.codingPath, this.currentIndex],
        "unkeyed container is at end"
      );
    }
    return this.currentIndex;
  }
}

// =============================================================================
// Encoding
// =============================================================================

type Slot =
  | { readonly kind: "empty" }
  | { readonly kind: "value"; readonly value: JsonValue }
  | { readonly kind: "object"; readonly value: JsonObject }
  | { readonly kind: "array"; readonly value: JsonValue[] };

export class JsonEncoder implements Encoder {
  readonly logger?: (message: string) => void;
  private slot: Slot = { kind: "empty" };

  /**
   * @param scalarOnly - Reject keyed and unkeyed containers; used behind a
   *   single-value container.
   */
  constructor(
    readonly codingPath: readonly CodingKey[] = [],
    private readonly settings: Settings = settingsFrom({}),
    private readonly scalarOnly = false
  ) {
    this.logger = settings.logger;
  }

  /** The encoded value; an encoder nothing was written to yields `{}`. */
  get value(): JsonValue {
    return this.slot.kind === "empty" ? {} : this.slot.value;
  }

  singleValueContainer(): SingleValueEncodingContainer {
    return new JsonSingleValueEncodingContainer(this, this.settings);
  }

  container(): KeyedEncodingContainer {
    this.ensureStructured("a keyed container");
    if (this.slot.kind !== "object") this.slot = { kind: "object", value: {} };
    return new JsonKeyedEncodingContainer(this.slot.value, this.codingPath, this.settings);
  }

  unkeyedContainer(): UnkeyedEncodingContainer {
    this.ensureStructured("an unkeyed container");
    if (this.slot.kind !== "array") this.slot = { kind: "array", value: [] };
    return new JsonUnkeyedEncodingContainer(this.slot.value, this.codingPath, this.settings);
  }

  /** @internal */
  store(value: JsonValue): void {
    this.slot = { kind: "value", value };
  }

  private ensureStructured(what: string): void {
    if (this.scalarOnly) {
      throw new EncodingError(
        "invalidValue",
        this.codingPath,
        `a single-value container cannot hold ${what}`
      );
    }
  }
}

function encodeChild<A>(
  encodable: Encodable<A>,
  value: A,
  codingPath: readonly CodingKey[],
  settings: Settings
): JsonValue {
  const child = new JsonEncoder(codingPath, settings);
  encodable.encode(value, child);
  return child.value;
}

class JsonSingleValueEncodingContainer implements SingleValueEncodingContainer {
  readonly codingPath: readonly CodingKey[];

  constructor(
    private readonly encoder: JsonEncoder,
    private readonly settings: Settings
  ) {
    this.codingPath = encoder.codingPath;
  }

  encodeNil(): void {
    this.encoder.store(null);
  }

  encodeBoolean(value: boolean): void {
    this.encoder.store(value);
  }

  encodeNumber(value: number): void {
    if (Number.isFinite(value)) {
      this.encoder.store(value);
      return;
    }
    const strategy = this.settings.nonConformingFloats;
    if (strategy === "throw") {
      throw new EncodingError(
        "invalidValue",
        this.codingPath,
        `${String(value)} is not representable in JSON`
      );
    }
    this.encoder.store(
      Number.isNaN(value)
        ? strategy.nan
        : value > 0
          ? strategy.positiveInfinity
          : strategy.negativeInfinity
    );
  }

  encodeString(value: string): void {
    this.encoder.store(value);
  }

  encode<A>(encodable: Encodable<A>, value: A): void {
    const inner = new JsonEncoder(this.codingPath, this.settings, true);
    encodable.encode(value, inner);
    this.encoder.store(inner.value);
  }
}

class JsonKeyedEncodingContainer implements KeyedEncodingContainer {
  constructor(
    private readonly object: JsonObject,
    readonly codingPath: readonly CodingKey[],
    private readonly settings: Settings
  ) {}

  encodeNil(key: string): void {
    this.set(key, null);
  }

  encode<A>(encodable: Encodable<A>, value: A, key: string): void {
    this.set(key, encodeChild(encodable, value, [...this.codingPath, key], this.settings));
  }

  /** Defines `key` as an own property; assignment would run the `__proto__` setter. */
  private set(key: string, value: JsonValue): void {
    Object.defineProperty(this.object, key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }

  encodeIfPresent<A>(encodable: Encodable<A>, value: A | undefined, key: string): void {
    if (value !== undefined) this.encode(encodable, value, key);
  }
}

class JsonUnkeyedEncodingContainer implements UnkeyedEncodingContainer {
  constructor(
    private readonly array: JsonValue[],
    readonly codingPath: readonly CodingKey[],
    private readonly settings: Settings
  ) {}

  get count(): number {
    return this.array.length;
  }

  encodeNil(): void {
    this.array.push(null);
  }

  encode<A>(encodable: Encodable<A>, value: A): void {
    this.array.push(
      encodeChild(encodable, value, [...this.codingPath, this.array.length], this.settings)
    );
  }
}

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Parse `text` as JSON and decode it. Malformed JSON throws a
 * `dataCorrupted` `DecodingError` whose `cause` is the parser's error.
 */
export function decodeJson<A>(
  text: string,
  decodable: Decodable<A>,
  options: JsonCodingOptions = {}
): A {
  let value: JsonValue;
  try {
    value = JSON.parse(text);
  } catch (cause) {
    throw new DecodingError("dataCorrupted", [], "the given data was not valid JSON", { cause });
  }
  return decodable.decode(new JsonDecoder(value, [], settingsFrom(options)));
}

/**
 * Decode without throwing: any failure comes back as a `DecodingError`.
 */
export function tryDecodeJson<A>(
  text: string,
  decodable: Decodable<A>,
  options: JsonCodingOptions = {}
): Result<A, DecodingError> {
  return from(
    () => decodeJson(text, decodable, options),
    (cause) =>
      isDecodingError(cause)
        ? cause
        : new DecodingError("dataCorrupted", [], String(cause), { cause })
  );
}

/**
 * Encode `value` and serialize it with `JSON.stringify`.
 */
export function encodeJson<A>(
  value: A,
  encodable: Encodable<A>,
  options: JsonCodingOptions = {}
): string {
  const { space } = options;
  const encoder = new JsonEncoder([], settingsFrom(options));
  encodable.encode(value, encoder);
  return JSON.stringify(encoder.value, null, space);
}
