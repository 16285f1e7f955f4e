/**
 * tagkit/binary-floating-point/binary64
 *
 * The `BinaryFloatingPoint` instance for JavaScript's `number`, an IEEE 754
 * binary64 value. The arithmetic the engine provides natively (`+`, `*`,
 * `Math.sqrt`, ...) is used as is; the rest (IEEE remainder, fused
 * multiply-add, bit access, total order) is computed from the bit pattern.
 */

import type {
  FloatingPointClassification,
  FloatingPointSign,
  RoundingRule,
} from "../floating-point";
import type { BinaryFloatingPoint } from "./index";
import {
  EXPONENT_BIAS,
  EXPONENT_BIT_COUNT,
  EXPONENT_MASK,
  MAGNITUDE_MASK,
  QUIET_NAN_BIT,
  SIGNIFICAND_BIT_COUNT,
  SIGNIFICAND_MASK,
  SIGN_MASK,
  binaryLogarithm,
  compose,
  decompose,
  exponentBitsOf,
  fromBits,
  toBits,
  trailingZeroBitCount,
} from "./bits";

const LEAST_NORMAL_MAGNITUDE = 2 ** -1022;
const LEAST_NORMAL_EXPONENT = 1 - EXPONENT_BIAS;
const GREATEST_FINITE_EXPONENT = EXPONENT_BIAS;
/** 2 ** -52 */
const EPSILON_SCALE = Number.EPSILON;

// =============================================================================
// Fields
// =============================================================================

const sign = (x: number): FloatingPointSign =>
  (toBits(x) & SIGN_MASK) === 0n ? "plus" : "minus";

const exponentBitPattern = (x: number): number => exponentBitsOf(toBits(x));

const significandBitPattern = (x: number): bigint => toBits(x) & SIGNIFICAND_MASK;

function fromBitPattern(
  s: FloatingPointSign,
  exponentBits: number,
  significandBits: bigint
): number {
  return fromBits(
    (s === "minus" ? SIGN_MASK : 0n) |
      ((BigInt(exponentBits) << 52n) & EXPONENT_MASK) |
      (significandBits & SIGNIFICAND_MASK)
  );
}

// =============================================================================
// Classification
// =============================================================================

const isFinite = (x: number): boolean => Number.isFinite(x);
const isNaN = (x: number): boolean => Number.isNaN(x);
const isZero = (x: number): boolean => x === 0;
const isInfinite = (x: number): boolean => x === Infinity || x === -Infinity;
const isNormal = (x: number): boolean => isFinite(x) && exponentBitPattern(x) !== 0;
const isSubnormal = (x: number): boolean =>
  exponentBitPattern(x) === 0 && significandBitPattern(x) !== 0n;
const isSignalingNaN = (x: number): boolean =>
  isNaN(x) && (significandBitPattern(x) & QUIET_NAN_BIT) === 0n;

function floatingPointClass(x: number): FloatingPointClassification {
  if (isNaN(x)) return isSignalingNaN(x) ? "signalingNaN" : "quietNaN";
  const negative = sign(x) === "minus";
  if (isInfinite(x)) return negative ? "negativeInfinity" : "positiveInfinity";
  if (isNormal(x)) return negative ? "negativeNormal" : "positiveNormal";
  if (isSubnormal(x)) return negative ? "negativeSubnormal" : "positiveSubnormal";
  return negative ? "negativeZero" : "positiveZero";
}

// =============================================================================
// Decomposition
// =============================================================================

function exponent(x: number): number {
  if (!isFinite(x)) return Number.MAX_SAFE_INTEGER;
  if (isZero(x)) return Number.MIN_SAFE_INTEGER;
  const provisional = exponentBitPattern(x) - EXPONENT_BIAS;
  if (isNormal(x)) return provisional;
  const shift = SIGNIFICAND_BIT_COUNT - binaryLogarithm(significandBitPattern(x));
  return provisional + 1 - shift;
}

function significand(x: number): number {
  if (isNaN(x)) return NaN;
  if (isNormal(x)) return fromBitPattern("plus", EXPONENT_BIAS, significandBitPattern(x));
  if (isSubnormal(x)) {
    const bits = significandBitPattern(x);
    const shift = SIGNIFICAND_BIT_COUNT - binaryLogarithm(bits);
    return fromBitPattern("plus", EXPONENT_BIAS, bits << BigInt(shift));
  }
  // zero or infinity
  return fromBitPattern("plus", exponentBitPattern(x), 0n);
}

function make(s: FloatingPointSign, exp: number, sig: number): number {
  let result = s === "minus" ? -sig : sig;
  if (isFinite(sig) && !isZero(sig)) {
    let clamped = exp;
    if (clamped < LEAST_NORMAL_EXPONENT) {
      clamped = Math.max(clamped, 3 * LEAST_NORMAL_EXPONENT);
      while (clamped < LEAST_NORMAL_EXPONENT) {
        result *= LEAST_NORMAL_MAGNITUDE;
        clamped -= LEAST_NORMAL_EXPONENT;
      }
    } else if (clamped > GREATEST_FINITE_EXPONENT) {
      clamped = Math.min(clamped, 3 * GREATEST_FINITE_EXPONENT);
      const step = fromBitPattern("plus", 0x7fe, 0n);
      while (clamped > GREATEST_FINITE_EXPONENT) {
        result *= step;
        clamped -= GREATEST_FINITE_EXPONENT;
      }
    }
    result *= fromBitPattern("plus", EXPONENT_BIAS + clamped, 0n);
  }
  return result;
}

const copySign = (signOf: number, magnitudeOf: number): number =>
  fromBits((toBits(magnitudeOf) & MAGNITUDE_MASK) | (toBits(signOf) & SIGN_MASK));

function ulp(x: number): number {
  if (!isFinite(x)) return NaN;
  if (isNormal(x)) return fromBits(toBits(x) & EXPONENT_MASK) * EPSILON_SCALE;
  return LEAST_NORMAL_MAGNITUDE * EPSILON_SCALE;
}

function binade(x: number): number {
  if (!isFinite(x)) return NaN;
  const mask = SIGN_MASK | EXPONENT_MASK;
  if (isSubnormal(x)) return fromBits(toBits(x * 2 ** 52) & mask) * EPSILON_SCALE;
  return fromBits(toBits(x) & mask);
}

function significandWidth(x: number): number {
  const bits = significandBitPattern(x);
  const trailing = trailingZeroBitCount(bits);
  if (isNormal(x)) return bits === 0n ? 0 : SIGNIFICAND_BIT_COUNT - trailing;
  if (isSubnormal(x)) return binaryLogarithm(bits) - trailing;
  return -1;
}

// =============================================================================
// Neighbours & Order
// =============================================================================

function nextUp(x: number): number {
  // +0 turns -0 into +0
  const y = x + 0;
  if (!(y < Infinity)) return y;
  const bits = toBits(y);
  return fromBits((bits & SIGN_MASK) === 0n ? bits + 1n : bits - 1n);
}

const nextDown = (x: number): number => -nextUp(-x);

function isTotallyOrderedBelowOrEqualTo(x: number, y: number): boolean {
  if (x < y) return true;
  if (y < x) return false;
  const xs = sign(x);
  if (xs !== sign(y)) return xs === "minus";
  const xe = exponentBitPattern(x);
  const ye = exponentBitPattern(y);
  if (xe > ye) return xs === "minus";
  if (xe < ye) return xs === "plus";
  const xm = significandBitPattern(x);
  const ym = significandBitPattern(y);
  if (xm > ym) return xs === "minus";
  if (xm < ym) return xs === "plus";
  return true;
}

// =============================================================================
// Arithmetic
// =============================================================================

function remainder(x: number, y: number): number {
  if (isNaN(x) || isNaN(y) || !isFinite(x) || y === 0) return NaN;
  if (!isFinite(y)) return x;

  const p = Math.abs(y);
  let r = Math.abs(p <= Number.MAX_VALUE / 2 ? x % (p + p) : x);
  if (p < 2 * LEAST_NORMAL_MAGNITUDE) {
    if (r + r > p) {
      r -= p;
      if (r + r >= p) r -= p;
    }
  } else {
    const half = 0.5 * p;
    if (r > half) {
      r -= p;
      if (r >= half) r -= p;
    }
  }
  return sign(x) === "minus" ? -r : r;
}

function addingProduct(addend: number, lhs: number, rhs: number): number {
  if (!isFinite(addend) || !isFinite(lhs) || !isFinite(rhs) || lhs === 0 || rhs === 0) {
    return addend + lhs * rhs;
  }
  // The exact product is nonzero here, so a zero addend never decides the sign.
  if (addend === 0) return lhs * rhs;

  const a = decompose(lhs);
  const b = decompose(rhs);
  const c = decompose(addend);
  const productExponent = a.exponent + b.exponent;
  const base = Math.min(productExponent, c.exponent);
  const sum =
    ((a.mantissa * b.mantissa) << BigInt(productExponent - base)) +
    (c.mantissa << BigInt(c.exponent - base));
  return compose(sum, base);
}

function rounded(x: number, rule: RoundingRule = "toNearestOrAwayFromZero"): number {
  if (!isFinite(x)) return x;
  switch (rule) {
    case "up":
      return Math.ceil(x);
    case "down":
      return Math.floor(x);
    case "towardZero":
      return Math.trunc(x);
    case "awayFromZero":
      return x < 0 ? Math.floor(x) : Math.ceil(x);
    case "toNearestOrAwayFromZero":
    case "toNearestOrEven": {
      const whole = Math.trunc(x);
      const fraction = Math.abs(x - whole);
      if (fraction < 0.5) return whole;
      if (fraction > 0.5 || rule === "toNearestOrAwayFromZero") return whole + Math.sign(x);
      return whole % 2 === 0 ? whole : whole + Math.sign(x);
    }
  }
}

function fromInteger(value: number | bigint): number {
  return typeof value === "bigint" ? Number(value) : value;
}

function exactly(value: number | bigint): number | undefined {
  if (typeof value === "number") return Number.isInteger(value) ? value : undefined;
  const x = Number(value);
  return Number.isFinite(x) && BigInt(x) === value ? x : undefined;
}

// =============================================================================
// Instance
// =============================================================================

export const binary64: BinaryFloatingPoint<number> = {
  radix: 2,
  exponentBitCount: EXPONENT_BIT_COUNT,
  significandBitCount: SIGNIFICAND_BIT_COUNT,

  zero: 0,
  nan: NaN,
  signalingNaN: fromBits(EXPONENT_MASK | (QUIET_NAN_BIT >> 1n)),
  infinity: Infinity,
  greatestFiniteMagnitude: Number.MAX_VALUE,
  leastNormalMagnitude: LEAST_NORMAL_MAGNITUDE,
  leastNonzeroMagnitude: Number.MIN_VALUE,
  pi: Math.PI,

  fromInteger,
  exactly,
  make,
  copySign,
  fromBitPattern,

  magnitude: Math.abs,
  negate: (x) => -x,
  ulp,
  sign,
  exponent,
  significand,
  exponentBitPattern,
  significandBitPattern,
  binade,
  significandWidth,

  add: (x, y) => x + y,
  subtract: (x, y) => x - y,
  multiply: (x, y) => x * y,
  divide: (x, y) => x / y,
  remainder,
  truncatingRemainder: (x, y) => x % y,
  squareRoot: Math.sqrt,
  addingProduct,
  nextUp,
  nextDown,
  rounded,

  equals: (x, y) => x === y,
  lessThan: (x, y) => x < y,
  isEqualTo: (x, y) => x === y,
  isLessThan: (x, y) => x < y,
  isLessThanOrEqualTo: (x, y) => x <= y,
  isTotallyOrderedBelowOrEqualTo,

  isNormal,
  isFinite,
  isZero,
  isSubnormal,
  isInfinite,
  isNaN,
  isSignalingNaN,
  isCanonical: () => true,
  floatingPointClass,
};
