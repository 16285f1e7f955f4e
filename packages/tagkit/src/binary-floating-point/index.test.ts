import { describe, it, expect } from "vitest";
import { tagger } from "../tagged";
import { BinaryFloatingPoint, binary64 } from "./index";

const Seconds = tagger<"Seconds", number>();
const S = BinaryFloatingPoint.tagged(Seconds, binary64);

describe("BinaryFloatingPoint.tagged", () => {
  it("exposes the bit fields of the raw value", () => {
    expect(S.exponentBitCount).toBe(11);
    expect(S.significandBitCount).toBe(52);
    expect(S.exponentBitPattern(Seconds(1))).toBe(1023);
    expect(S.significandBitPattern(Seconds(1.5))).toBe(1n << 51n);
  });

  it("builds from a bit pattern", () => {
    expect(S.fromBitPattern("minus", 1024, 0n)).toBe(-2);
  });

  it("forwards binade and significandWidth", () => {
    expect(S.binade(Seconds(3))).toBe(2);
    expect(S.significandWidth(Seconds(1.5))).toBe(1);
  });

  it("keeps the floating-point operations and constants", () => {
    expect(S.add(Seconds(1), Seconds(2))).toBe(3);
    expect(S.negate(S.infinity)).toBe(-Infinity);
    expect(S.addAssign(S.infinity, Seconds(1))).toBe(Infinity);
    expect(S.infinity).toBe(Infinity);
  });
});
