/**
 * Tests for binary64.ts - the IEEE 754 double instance
 */
import { describe, it, expect } from "vitest";
import { binary64 as F } from "./binary64";

const MIN = Number.MIN_VALUE;

describe("binary64", () => {
  describe("constants", () => {
    it("matches the double's limits", () => {
      expect(F.radix).toBe(2);
      expect(F.exponentBitCount).toBe(11);
      expect(F.significandBitCount).toBe(52);
      expect(F.greatestFiniteMagnitude).toBe(Number.MAX_VALUE);
      expect(F.leastNormalMagnitude).toBe(2.2250738585072014e-308);
      expect(F.leastNonzeroMagnitude).toBe(MIN);
      expect(F.pi).toBe(Math.PI);
    });

    it("signalingNaN is a NaN, quiet NaN is not signaling", () => {
      expect(Number.isNaN(F.signalingNaN)).toBe(true);
      expect(F.isSignalingNaN(F.nan)).toBe(false);
    });
  });

  describe("bit fields", () => {
    it("reads the exponent and significand bits", () => {
      expect(F.exponentBitPattern(1)).toBe(1023);
      expect(F.significandBitPattern(1.5)).toBe(1n << 51n);
      expect(F.sign(-0)).toBe("minus");
      expect(F.sign(0)).toBe("plus");
    });

    it("fromBitPattern rebuilds the value", () => {
      expect(F.fromBitPattern("minus", 1023, 0n)).toBe(-1);
      const x = 0.1;
      expect(
        F.fromBitPattern(F.sign(x), F.exponentBitPattern(x), F.significandBitPattern(x))
      ).toBe(x);
    });
  });

  describe("exponent and significand", () => {
    it("decomposes normal values", () => {
      expect(F.exponent(8)).toBe(3);
      expect(F.significand(8)).toBe(1);
      expect(F.exponent(0.1)).toBe(-4);
      expect(F.significand(0.1)).toBe(1.6);
      expect(F.significand(-8)).toBe(1);
    });

    it("decomposes subnormal values", () => {
      expect(F.exponent(MIN)).toBe(-1074);
      expect(F.significand(MIN)).toBe(1);
      expect(F.significand(3 * MIN)).toBe(1.5);
    });

    it("handles zero and non-finite values", () => {
      expect(F.exponent(0)).toBe(Number.MIN_SAFE_INTEGER);
      expect(F.exponent(Infinity)).toBe(Number.MAX_SAFE_INTEGER);
      expect(F.significand(0)).toBe(0);
      expect(F.significand(Infinity)).toBe(Infinity);
      expect(F.significand(NaN)).toBeNaN();
    });

    it("make scales by a power of two", () => {
      expect(F.make("plus", 3, 1.5)).toBe(12);
      expect(F.make("minus", -1, 1)).toBe(-0.5);
      expect(F.make("plus", -1074, 1)).toBe(MIN);
      expect(F.make("plus", 1024, 0.5)).toBe(2 ** 1023);
      expect(F.make("plus", 1024, 1)).toBe(Infinity);
    });
  });

  describe("ulp, binade, significandWidth", () => {
    it("ulp is the spacing at the value", () => {
      expect(F.ulp(1)).toBe(Number.EPSILON);
      expect(F.ulp(-2)).toBe(2 ** -51);
      expect(F.ulp(0)).toBe(MIN);
      expect(F.ulp(Infinity)).toBeNaN();
    });

    it("binade is the signed power of two below the value", () => {
      expect(F.binade(3)).toBe(2);
      expect(F.binade(-3)).toBe(-2);
      expect(F.binade(0.75)).toBe(0.5);
      expect(F.binade(3 * MIN)).toBe(2 * MIN);
      expect(F.binade(NaN)).toBeNaN();
    });

    it("significandWidth counts bits after the leading one", () => {
      expect(F.significandWidth(1)).toBe(0);
      expect(F.significandWidth(3)).toBe(1);
      expect(F.significandWidth(0.1)).toBe(51);
      expect(F.significandWidth(MIN)).toBe(0);
      expect(F.significandWidth(3 * MIN)).toBe(1);
      expect(F.significandWidth(0)).toBe(-1);
      expect(F.significandWidth(Infinity)).toBe(-1);
    });
  });

  describe("neighbours", () => {
    it("nextUp steps to the next representable value", () => {
      expect(F.nextUp(1)).toBe(1 + Number.EPSILON);
      expect(F.nextUp(-0)).toBe(MIN);
      expect(F.nextUp(-MIN)).toBe(-0);
      expect(F.nextUp(Number.MAX_VALUE)).toBe(Infinity);
      expect(F.nextUp(-Infinity)).toBe(-Number.MAX_VALUE);
      expect(F.nextUp(Infinity)).toBe(Infinity);
      expect(F.nextUp(NaN)).toBeNaN();
    });

    it("nextDown mirrors nextUp", () => {
      expect(F.nextDown(1)).toBe(1 - Number.EPSILON / 2);
      expect(F.nextDown(0)).toBe(-MIN);
    });
  });

  describe("remainder", () => {
    it("rounds the quotient to nearest, ties to even", () => {
      expect(F.remainder(5, 3)).toBe(-1);
      expect(F.remainder(7, 2)).toBe(-1);
      expect(F.remainder(6, 4)).toBe(-2);
      expect(F.remainder(-5, 3)).toBe(1);
    });

    it("keeps the sign of a zero result", () => {
      expect(F.remainder(-6, 3)).toBe(-0);
    });

    it("handles special operands", () => {
      expect(F.remainder(5, Infinity)).toBe(5);
      expect(F.remainder(Infinity, 1)).toBeNaN();
      expect(F.remainder(1, 0)).toBeNaN();
    });

    it("truncatingRemainder keeps the dividend's sign", () => {
      expect(F.truncatingRemainder(5, 3)).toBe(2);
      expect(F.truncatingRemainder(-5, 3)).toBe(-2);
    });
  });

  describe("addingProduct", () => {
    it("rounds once", () => {
      expect(0.1 * 10 - 1).toBe(0);
      expect(F.addingProduct(-1, 0.1, 10)).toBe(2 ** -54);
    });

    it("does not overflow in the intermediate product", () => {
      expect(F.addingProduct(-Number.MAX_VALUE, Number.MAX_VALUE, 2)).toBe(Number.MAX_VALUE);
    });

    it("matches plain arithmetic when exact", () => {
      expect(F.addingProduct(1, 2, 3)).toBe(7);
      expect(F.addingProduct(-6, 2, 3)).toBe(0);
      expect(F.addingProduct(5, 0, 3)).toBe(5);
      expect(F.addingProduct(1, Infinity, 2)).toBe(Infinity);
    });

    it("keeps the sign of a product that underflows onto a zero addend", () => {
      expect(F.addingProduct(0, -Number.MIN_VALUE, 0.5)).toBe(-0);
      expect(F.addingProduct(-0, Number.MIN_VALUE, 0.5)).toBe(0);
      expect(F.addingProduct(-0, 3, 2)).toBe(6);
    });
  });

  describe("rounded", () => {
    it("defaults to nearest, ties away from zero", () => {
      expect(F.rounded(2.5)).toBe(3);
      expect(F.rounded(-2.5)).toBe(-3);
      expect(F.rounded(2.4)).toBe(2);
      expect(F.rounded(-0.4)).toBe(-0);
    });

    it("supports every rule", () => {
      expect(F.rounded(2.5, "toNearestOrEven")).toBe(2);
      expect(F.rounded(3.5, "toNearestOrEven")).toBe(4);
      expect(F.rounded(-2.5, "toNearestOrEven")).toBe(-2);
      expect(F.rounded(2.4, "up")).toBe(3);
      expect(F.rounded(-2.4, "up")).toBe(-2);
      expect(F.rounded(-2.4, "down")).toBe(-3);
      expect(F.rounded(-2.7, "towardZero")).toBe(-2);
      expect(F.rounded(2.1, "awayFromZero")).toBe(3);
      expect(F.rounded(-2.1, "awayFromZero")).toBe(-3);
    });

    it("leaves non-finite values alone", () => {
      expect(F.rounded(Infinity)).toBe(Infinity);
      expect(F.rounded(NaN)).toBeNaN();
    });
  });

  describe("comparisons", () => {
    it("total order separates signed zeros and places NaN last", () => {
      expect(F.isTotallyOrderedBelowOrEqualTo(-0, 0)).toBe(true);
      expect(F.isTotallyOrderedBelowOrEqualTo(0, -0)).toBe(false);
      expect(F.isTotallyOrderedBelowOrEqualTo(1, NaN)).toBe(true);
      expect(F.isTotallyOrderedBelowOrEqualTo(NaN, Infinity)).toBe(false);
      expect(F.isTotallyOrderedBelowOrEqualTo(2, 2)).toBe(true);
    });

    it("IEEE comparisons are false with NaN", () => {
      expect(F.isEqualTo(NaN, NaN)).toBe(false);
      expect(F.isLessThan(NaN, 1)).toBe(false);
      expect(F.isLessThanOrEqualTo(1, NaN)).toBe(false);
      expect(F.isEqualTo(0, -0)).toBe(true);
    });
  });

  describe("classification", () => {
    it("classifies every kind of value", () => {
      expect(F.floatingPointClass(1)).toBe("positiveNormal");
      expect(F.floatingPointClass(-0)).toBe("negativeZero");
      expect(F.floatingPointClass(MIN)).toBe("positiveSubnormal");
      expect(F.floatingPointClass(-Infinity)).toBe("negativeInfinity");
      expect(F.floatingPointClass(NaN)).toBe("quietNaN");
    });

    it("answers the predicates", () => {
      expect(F.isNormal(1)).toBe(true);
      expect(F.isNormal(0)).toBe(false);
      expect(F.isSubnormal(MIN)).toBe(true);
      expect(F.isZero(-0)).toBe(true);
      expect(F.isInfinite(-Infinity)).toBe(true);
      expect(F.isFinite(NaN)).toBe(false);
      expect(F.isCanonical(1)).toBe(true);
    });
  });

  describe("integer conversion", () => {
    it("fromInteger rounds to nearest, ties to even", () => {
      expect(F.fromInteger(2n ** 53n + 1n)).toBe(2 ** 53);
      expect(F.fromInteger(7)).toBe(7);
    });

    it("exactly accepts only exact integers", () => {
      expect(F.exactly(2n ** 53n)).toBe(2 ** 53);
      expect(F.exactly(2n ** 53n + 1n)).toBeUndefined();
      expect(F.exactly(3)).toBe(3);
      expect(F.exactly(1.5)).toBeUndefined();
    });
  });

  it("copySign combines sign and magnitude", () => {
    expect(F.copySign(-1, 3)).toBe(-3);
    expect(F.copySign(1, -0)).toBe(0);
    expect(F.copySign(-0, 5)).toBe(-5);
  });
});
