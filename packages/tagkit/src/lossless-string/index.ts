/**
 * tagkit/lossless-string
 *
 * Text conversion that round-trips: `parse(describe(x))` gives back a value
 * equal to `x`. Parsing returns `undefined` for text that is not a valid
 * description; it never throws.
 *
 * @example
 * ```typescript
 * import { LosslessString } from 'tagkit/lossless-string';
 *
 * const Port = tagger<"Port", number>();
 * const PortText = LosslessString.tagged(Port, LosslessString.number);
 *
 * PortText.parse("8080");     // Port(8080)
 * PortText.parse("eighty");   // undefined
 * ```
 */

import type { Tagged, Tagger } from "../tagged";

export interface LosslessString<A> {
  readonly parse: (description: string) => A | undefined;
  readonly describe: (self: A) => string;
}

// =============================================================================
// Instances
// =============================================================================

const DECIMAL = /^(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const HEXADECIMAL = /^0x[0-9a-f]+$/i;
const INFINITY = /^inf(?:inity)?$/i;
const NAN = /^nan$/i;

/**
 * Decimal and hexadecimal numerals, `inf`/`infinity` and `nan` (any case),
 * each with an optional sign. `-0` is described as `"-0"`.
 */
export const number: LosslessString<number> = {
  parse: (description) => {
    const negative = description.startsWith("-");
    const body = /^[+-]/.test(description) ? description.slice(1) : description;
    let magnitude: number;
    if (DECIMAL.test(body) || HEXADECIMAL.test(body)) magnitude = Number(body);
    else if (INFINITY.test(body)) magnitude = Infinity;
    else if (NAN.test(body)) magnitude = NaN;
    else return undefined;
    return negative ? -magnitude : magnitude;
  },
  describe: (self) => (Object.is(self, -0) ? "-0" : String(self)),
};

export const bigint: LosslessString<bigint> = {
  parse: (description) => (/^[+-]?\d+$/.test(description) ? BigInt(description) : undefined),
  describe: (self) => self.toString(),
};

export const boolean: LosslessString<boolean> = {
  parse: (description) =>
    description === "true" ? true : description === "false" ? false : undefined,
  describe: (self) => String(self),
};

export const string: LosslessString<string> = {
  parse: (description) => description,
  describe: (self) => self,
};

// =============================================================================
// Lift
// =============================================================================

export const tagged = <Tag, Raw>(
  T: Tagger<Tag, Raw>,
  L: LosslessString<Raw>
): LosslessString<Tagged<Tag, Raw>> => ({
  parse: (description) => {
    const raw = L.parse(description);
    return raw === undefined ? undefined : T(raw);
  },
  describe: (self) => L.describe(T.unwrap(self)),
});

export const LosslessString = {
  number,
  bigint,
  boolean,
  string,
  tagged,
} as const;
