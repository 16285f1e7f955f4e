/**
 * Tests for codable - the tagged lift and built-in codables, through the JSON coder
 */
import { describe, it, expect, vi } from "vitest";
import { tagger } from "../tagged";
import { DecodingError, EncodingError } from "../errors";
import { Codable } from "./index";
import { decodeJson, encodeJson } from "./json";

type Point = { x: number; y: number };

const point: Codable<Point> = {
  decode: (decoder) => {
    const container = decoder.container();
    return { x: container.decode(Codable.number, "x"), y: container.decode(Codable.number, "y") };
  },
  encode: (value, encoder) => {
    const container = encoder.container();
    container.encode(Codable.number, value.x, "x");
    container.encode(Codable.number, value.y, "y");
  },
};

const UserId = tagger<"UserId", number>();
const Location = tagger<"Location", Point>();
const Balance = tagger<"Balance", bigint>();

describe("Codable", () => {
  describe("tagged: scalar raw values", () => {
    it("decodes through the single-value path without logging", () => {
      const logger = vi.fn();
      const C = Codable.tagged(UserId, Codable.number, { logger });
      expect(decodeJson("42", C)).toBe(42);
      expect(logger).not.toHaveBeenCalled();
    });

    it("encodes exactly as the raw value", () => {
      const logger = vi.fn();
      const C = Codable.tagged(UserId, Codable.number, { logger });
      expect(encodeJson(UserId(42), C)).toBe("42");
      expect(encodeJson(UserId(42), C)).toBe(JSON.stringify(UserId(42)));
      expect(logger).not.toHaveBeenCalled();
    });

    it("bigint codes as a decimal string", () => {
      const C = Codable.tagged(Balance, Codable.bigint);
      expect(encodeJson(Balance(2n ** 64n), C)).toBe('"18446744073709551616"');
      expect(decodeJson('"-5"', C)).toBe(-5n);
    });
  });

  describe("tagged: structured raw values", () => {
    it("falls back to the whole decoder and logs once", () => {
      const logger = vi.fn();
      const C = Codable.tagged(Location, point, { logger });
      expect(decodeJson('{"x":1,"y":2}', C)).toEqual({ x: 1, y: 2 });
      expect(logger).toHaveBeenCalledTimes(1);
      expect(logger).toHaveBeenCalledWith(
        "single-value decode failed at <root>, decoding from the whole decoder: DecodingError: typeMismatch at <root>: expected a single value but found an object"
      );
    });

    it("falls back to the whole encoder and logs once", () => {
      const logger = vi.fn();
      const C = Codable.tagged(Location, point, { logger });
      expect(encodeJson(Location({ x: 1, y: 2 }), C)).toBe('{"x":1,"y":2}');
      expect(logger).toHaveBeenCalledTimes(1);
      expect(logger).toHaveBeenCalledWith(
        "single-value encode failed at <root>, encoding into the whole encoder: EncodingError: invalidValue at <root>: a single-value container cannot hold a keyed container"
      );
    });

    it("uses the coder's logger when none is given", () => {
      const logger = vi.fn();
      const C = Codable.tagged(Location, point);
      decodeJson('{"x":1,"y":2}', C, { logger });
      expect(logger).toHaveBeenCalledTimes(1);
    });
  });

  describe("tagged: failures", () => {
    it("surfaces the error of the second attempt", () => {
      let attempts = 0;
      const flaky: Codable<number> = {
        decode: () => {
          attempts++;
          throw new Error(`attempt ${attempts}`);
        },
        encode: () => {},
      };
      const logger = vi.fn();
      const C = Codable.tagged(UserId, flaky, { logger });
      expect(() => decodeJson("1", C)).toThrow("attempt 2");
      expect(logger).toHaveBeenCalledWith(
        "single-value decode failed at <root>, decoding from the whole decoder: attempt 1"
      );
    });

    it("reports a type mismatch with the coding path", () => {
      const C = Codable.tagged(UserId, Codable.number);
      const ids = Codable.array(C);
      expect(() => decodeJson('[1, "x"]', ids)).toThrow(
        'DecodingError: typeMismatch at [1]: expected a number but found string "x"'
      );
    });

    it("propagates encoding failures of the raw value", () => {
      const C = Codable.tagged(UserId, Codable.number);
      expect(() => encodeJson(UserId(Infinity), C)).toThrow(EncodingError);
    });
  });

  describe("built-in codables", () => {
    it("arrays of tagged values", () => {
      const ids = Codable.array(Codable.tagged(UserId, Codable.number));
      const decoded = decodeJson("[1,2]", ids);
      expect(decoded).toEqual([1, 2]);
      expect(encodeJson(decoded, ids)).toBe("[1,2]");
    });

    it("nullable decodes null", () => {
      const maybe = Codable.array(Codable.nullable(Codable.number));
      expect(decodeJson("[null,2]", maybe)).toEqual([null, 2]);
      expect(encodeJson([null, 3], maybe)).toBe("[null,3]");
    });

    it("nullable wraps structured values", () => {
      expect(decodeJson('{"x":0,"y":5}', Codable.nullable(point))).toEqual({ x: 0, y: 5 });
    });

    it("booleans and strings", () => {
      expect(decodeJson("true", Codable.boolean)).toBe(true);
      expect(encodeJson("a\"b", Codable.string)).toBe('"a\\"b"');
    });

    it("rejects a malformed bigint", () => {
      expect(() => decodeJson('"12x"', Codable.bigint)).toThrow(
        'DecodingError: dataCorrupted at <root>: expected a decimal integer but found "12x"'
      );
    });

    it("a missing key is keyNotFound", () => {
      try {
        decodeJson('{"y":1}', point);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(DecodingError);
        if (error instanceof DecodingError) {
          expect(error.kind).toBe("keyNotFound");
          expect(error.debugDescription).toBe('no value associated with key "x"');
        }
      }
    });
  });
});
