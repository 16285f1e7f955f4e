import { describe, it, expect } from "vitest";
import { tagger } from "../tagged";
import { Hash, type HashKey } from "./index";

const UserId = tagger<"UserId", number>();
const Email = tagger<"Email", string>();

describe("Hash", () => {
  it("primitives hash to themselves", () => {
    expect(Hash.number.hash(3)).toBe(3);
    expect(Hash.string.hash("a")).toBe("a");
    expect(Hash.bigint.hash(9n)).toBe(9n);
  });

  it("fromMethods delegates to equals and hashCode", () => {
    class Key {
      constructor(readonly id: string) {}
      equals(that: Key): boolean {
        return this.id.toLowerCase() === that.id.toLowerCase();
      }
      hashCode(): HashKey {
        return this.id.toLowerCase();
      }
    }
    const H = Hash.fromMethods<Key>();
    expect(H.equals(new Key("A"), new Key("a"))).toBe(true);
    expect(H.hash(new Key("A"))).toBe("a");
  });

  describe("tagged", () => {
    const H = Hash.tagged(UserId, Hash.number);

    it("hashes the raw value", () => {
      expect(H.hash(UserId(42))).toBe(42);
    });

    it("equal values hash equally", () => {
      const a = UserId(7);
      const b = UserId(7);
      expect(H.equals(a, b)).toBe(true);
      expect(H.hash(a)).toBe(H.hash(b));
    });

    it("keys a Map by raw value", () => {
      const E = Hash.tagged(Email, Hash.string);
      const names = new Map<HashKey, string>();
      names.set(E.hash(Email("ada@example.com")), "ada");
      expect(names.get(E.hash(Email("ada@example.com")))).toBe("ada");
    });
  });
});
