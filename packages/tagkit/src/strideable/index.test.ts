import { describe, it, expect } from "vitest";
import { tagger } from "../tagged";
import { Strideable } from "./index";

const Page = tagger<"Page", number>();
const Timestamp = tagger<"Timestamp", Date>();
const Block = tagger<"Block", bigint>();

describe("Strideable", () => {
  describe("tagged", () => {
    it("distance returns the raw stride", () => {
      const P = Strideable.tagged(Page, Strideable.number);
      expect(P.distance(Page(3), Page(10))).toBe(7);
      expect(P.distance(Page(10), Page(3))).toBe(-7);
    });

    it("advanced re-wraps under the same tag", () => {
      const P = Strideable.tagged(Page, Strideable.number);
      const next = P.advanced(Page(3), 2);
      expect(next).toBe(5);
    });

    it("works for bigint", () => {
      const B = Strideable.tagged(Block, Strideable.bigint);
      expect(B.advanced(Block(10n), -3n)).toBe(7n);
      expect(B.distance(Block(1n), Block(4n))).toBe(3n);
    });

    it("measures dates in milliseconds", () => {
      const T = Strideable.tagged(Timestamp, Strideable.date);
      const start = Timestamp(new Date(1_000));
      expect(T.advanced(start, 500).getTime()).toBe(1_500);
      expect(T.distance(start, Timestamp(new Date(4_000)))).toBe(3_000);
      expect(start.getTime()).toBe(1_000);
    });
  });

  describe("stride", () => {
    it("steps towards the end, exclusive", () => {
      expect([...Strideable.stride(Strideable.number, 0, 10, 3)]).toEqual([0, 3, 6, 9]);
      expect([...Strideable.stride(Strideable.number, 5, 0, -2)]).toEqual([5, 3, 1]);
    });

    it("yields nothing for a step away from the end", () => {
      expect([...Strideable.stride(Strideable.number, 0, 10, -1)]).toEqual([]);
      expect([...Strideable.stride(Strideable.number, 0, 10, 0)]).toEqual([]);
    });

    it("strides over tagged values", () => {
      const P = Strideable.tagged(Page, Strideable.number);
      const pages = [...Strideable.stride(P, Page(1), Page(4), 1)];
      expect(pages).toEqual([1, 2, 3]);
    });
  });
});
