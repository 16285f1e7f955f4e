/**
 * Tests for presets.ts - ready-made tagged number, bigint and string types
 */
import { describe, it, expect, vi } from "vitest";
import { Sequence } from "./sequence";
import { decodeJson, encodeJson } from "./codable/json";
import { numberTag, bigintTag, stringTag } from "./presets";

describe("Presets", () => {
  describe("numberTag", () => {
    const Meters = numberTag<"Meters">();

    it("is a tagger", () => {
      expect(Meters(1.5)).toBe(1.5);
      expect(Meters.unwrap(Meters.wrap(2))).toBe(2);
    });

    it("carries arithmetic, order and hashing", () => {
      expect(Meters.add(Meters(1.5), Meters(2))).toBe(3.5);
      expect(Meters.lessThan(Meters(1), Meters(2))).toBe(true);
      expect(Meters.equals(Meters(NaN), Meters(NaN))).toBe(false);
      expect(Meters.hash(Meters(3))).toBe(3);
      expect(Meters.remainder(Meters(5), Meters(3))).toBe(-1);
      expect(Meters.binade(Meters(3))).toBe(2);
    });

    it("returns replacements from compound assignment", () => {
      let length = Meters.zero;
      length = Meters.addAssign(length, Meters(1));
      expect(length).toBe(1);
      expect(Meters.zero).toBe(0);
    });

    it("carries strides, literals and text", () => {
      expect(Meters.advanced(Meters(1), 2)).toBe(3);
      expect(Meters.distance(Meters(1), Meters(4))).toBe(3);
      expect(Meters.literal(2.5)).toBe(2.5);
      expect(Meters.parse("12.5")).toBe(12.5);
      expect(Meters.describe(Meters(-0))).toBe("-0");
    });

    it("is codable", () => {
      expect(decodeJson("1.5", Meters)).toBe(1.5);
      expect(encodeJson(Meters(2), Meters)).toBe("2");
    });

    it("passes the logger to the codable lift", () => {
      const logger = vi.fn();
      const Strict = numberTag<"Strict">({ logger });
      expect(() => decodeJson('"x"', Strict)).toThrow('expected a number but found string "x"');
      expect(logger).toHaveBeenCalledTimes(1);
    });
  });

  describe("bigintTag", () => {
    const Cents = bigintTag<"Cents">();

    it("carries additive arithmetic with mutating forms", () => {
      let total = Cents.add(Cents(250n), Cents(199n));
      expect(total).toBe(449n);
      total = Cents.subtractAssign(total, Cents(49n));
      expect(total).toBe(400n);
      expect(Cents.zero).toBe(0n);
    });

    it("carries order, hashing and strides", () => {
      expect(Cents.greaterThan(Cents(2n), Cents(1n))).toBe(true);
      expect(Cents.hash(Cents(7n))).toBe(7n);
      expect(Cents.advanced(Cents(1n), 4n)).toBe(5n);
    });

    it("builds from literals and text", () => {
      expect(Cents.literal(5)).toBe(5n);
      expect(Cents.parse("10")).toBe(10n);
      expect(Cents.parse("1.0")).toBeUndefined();
    });

    it("codes as a decimal string", () => {
      expect(encodeJson(Cents(5n), Cents)).toBe('"5"');
      expect(decodeJson('"12"', Cents)).toBe(12n);
    });
  });

  describe("stringTag", () => {
    const Name = stringTag<"Name">();

    it("carries order and hashing", () => {
      expect(Name.lessThan(Name("ada"), Name("grace"))).toBe(true);
      expect(Name.equals(Name("ada"), Name("ada"))).toBe(true);
      expect(Name.hash(Name("ada"))).toBe("ada");
    });

    it("is a collection of characters", () => {
      const name = Name("ada");
      expect(Sequence.count(Name)(name)).toBe(3);
      expect(Name.element(name, 1)).toBe("d");
      expect([...Name.elements(name)]).toEqual(["a", "d", "a"]);
    });

    it("builds from literals and interpolation", () => {
      const n = 2;
      expect(Name.literal("x")).toBe("x");
      expect(Name.interpolate`user-${n}`).toBe("user-2");
    });

    it("is codable and lossless", () => {
      expect(encodeJson(Name("ada"), Name)).toBe('"ada"');
      expect(decodeJson('"ada"', Name)).toBe("ada");
      expect(Name.parse("anything")).toBe("anything");
    });
  });
});
