/**
 * tagkit/binary-floating-point/bits (internal)
 *
 * Bit-level access to IEEE 754 binary64 values and exact rounding of a
 * `bigint` scaled by a power of two.
 */

const view = new DataView(new ArrayBuffer(8));

export const SIGNIFICAND_BIT_COUNT = 52;
export const EXPONENT_BIT_COUNT = 11;
export const EXPONENT_BIAS = 1023;

export const SIGN_MASK = 1n << 63n;
export const MAGNITUDE_MASK = SIGN_MASK - 1n;
export const SIGNIFICAND_MASK = (1n << 52n) - 1n;
export const EXPONENT_MASK = 0x7ffn << 52n;
export const QUIET_NAN_BIT = 1n << 51n;

const HIDDEN_BIT = 1n << 52n;
const PRECISION_LIMIT = 1n << 53n;
const MIN_SUBNORMAL_EXPONENT = -1074;

export function toBits(x: number): bigint {
  view.setFloat64(0, x);
  return view.getBigUint64(0);
}

export function fromBits(bits: bigint): number {
  view.setBigUint64(0, BigInt.asUintN(64, bits));
  return view.getFloat64(0);
}

export const exponentBitsOf = (bits: bigint): number => Number((bits & EXPONENT_MASK) >> 52n);

/** Index of the highest set bit; -1 for zero. */
export const binaryLogarithm = (n: bigint): number => (n === 0n ? -1 : n.toString(2).length - 1);

export function trailingZeroBitCount(n: bigint): number {
  if (n === 0n) return 64;
  let count = 0;
  while ((n & 1n) === 0n) {
    n >>= 1n;
    count++;
  }
  return count;
}

/**
 * A finite, nonzero double as `mantissa * 2 ** exponent`, with the sign
 * carried by the mantissa.
 */
export function decompose(x: number): { mantissa: bigint; exponent: number } {
  const bits = toBits(x);
  const exponentBits = exponentBitsOf(bits);
  const significand = bits & SIGNIFICAND_MASK;
  const magnitude = exponentBits === 0 ? significand : significand | HIDDEN_BIT;
  const exponent =
    (exponentBits === 0 ? 1 : exponentBits) - EXPONENT_BIAS - SIGNIFICAND_BIT_COUNT;
  return { mantissa: (bits & SIGN_MASK) === 0n ? magnitude : -magnitude, exponent };
}

/**
 * The double nearest to `mantissa * 2 ** exponent`, ties to even. Overflows
 * to an infinity and underflows through the subnormals to a signed zero.
 */
export function compose(mantissa: bigint, exponent: number): number {
  if (mantissa === 0n) return 0;
  const sign = mantissa < 0n ? SIGN_MASK : 0n;
  const magnitude = mantissa < 0n ? -mantissa : mantissa;

  const topExponent = binaryLogarithm(magnitude) + exponent;
  let lsbExponent = Math.max(topExponent - SIGNIFICAND_BIT_COUNT, MIN_SUBNORMAL_EXPONENT);
  const shift = lsbExponent - exponent;

  let q: bigint;
  if (shift <= 0) {
    q = magnitude << BigInt(-shift);
  } else {
    const s = BigInt(shift);
    q = magnitude >> s;
    const rest = magnitude - (q << s);
    const half = 1n << (s - 1n);
    if (rest > half || (rest === half && (q & 1n) === 1n)) q += 1n;
    if (q === PRECISION_LIMIT) {
      q >>= 1n;
      lsbExponent += 1;
    }
  }

  if (q < HIDDEN_BIT) return fromBits(sign | q);
  const exponentBits = lsbExponent + SIGNIFICAND_BIT_COUNT + EXPONENT_BIAS;
  if (exponentBits >= 0x7ff) return fromBits(sign | EXPONENT_MASK);
  return fromBits(sign | (BigInt(exponentBits) << 52n) | (q & SIGNIFICAND_MASK));
}
