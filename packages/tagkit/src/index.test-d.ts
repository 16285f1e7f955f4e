/**
 * Type tests for tagkit
 * Run by vitest's typecheck mode.
 *
 * The point of a tag is what does NOT compile, so most checks here are negative.
 */
import { describe, it, expectTypeOf } from "vitest";
import {
  Tagkit,
  type Tagged,
  type TaggedOf,
  type RawOf,
  type TagOf,
  type Equivalence,
} from "./index";

const { tagger, tagged, AdditiveArithmetic, Equivalence: Eq, Literal, Order, numberTag } = Tagkit;

type UserId = Tagged<"UserId", number>;
type OrderId = Tagged<"OrderId", number>;

const UserId = tagger<"UserId", number>();

describe("tag identity", () => {
  it("different tags over one raw type are distinct", () => {
    expectTypeOf<OrderId>().not.toMatchTypeOf<UserId>();
    expectTypeOf<UserId>().not.toMatchTypeOf<OrderId>();
  });

  it("the tag is invariant", () => {
    expectTypeOf<UserId>().not.toMatchTypeOf<Tagged<"UserId" | "OrderId", number>>();
    expectTypeOf<Tagged<"UserId" | "OrderId", number>>().not.toMatchTypeOf<UserId>();
    expectTypeOf<UserId>().not.toMatchTypeOf<Tagged<unknown, number>>();
  });

  it("the same tag and raw type match", () => {
    expectTypeOf(UserId(1)).toEqualTypeOf<UserId>();
    expectTypeOf(tagged<"UserId", number>(1)).toEqualTypeOf<UserId>();
  });

  it("a raw value is not a tagged value, but a tagged value is its raw value", () => {
    expectTypeOf<number>().not.toMatchTypeOf<UserId>();
    expectTypeOf<UserId>().toMatchTypeOf<number>();
  });
});

describe("type utilities", () => {
  it("recover the tag and raw type", () => {
    expectTypeOf<TaggedOf<typeof UserId>>().toEqualTypeOf<UserId>();
    expectTypeOf<RawOf<UserId>>().toEqualTypeOf<number>();
    expectTypeOf<RawOf<typeof UserId>>().toEqualTypeOf<number>();
    expectTypeOf<TagOf<UserId>>().toEqualTypeOf<"UserId">();
  });
});

describe("tagger operations", () => {
  it("map keeps the tag", () => {
    expectTypeOf(UserId.map(UserId(1), String)).toEqualTypeOf<Tagged<"UserId", string>>();
  });

  it("unsafeCoerce changes only the tag", () => {
    expectTypeOf(UserId.unsafeCoerce<"OrderId">(UserId(1))).toEqualTypeOf<OrderId>();
  });

  it("members of the raw value keep their types", () => {
    const email = tagged<"Email", { address: string; verified: boolean }>({
      address: "ada@example.com",
      verified: false,
    });
    expectTypeOf(email.verified).toEqualTypeOf<boolean>();
    expectTypeOf(email.address).toEqualTypeOf<string>();
  });
});

describe("lifted capabilities", () => {
  it("accept only the lifted tag", () => {
    const A = AdditiveArithmetic.tagged(UserId, AdditiveArithmetic.number);
    expectTypeOf(A.add).parameter(1).toEqualTypeOf<UserId>();
    expectTypeOf<OrderId>().not.toMatchTypeOf<Parameters<typeof A.add>[1]>();
    expectTypeOf(A.add).returns.toEqualTypeOf<UserId>();
  });

  it("derive the instance for the tagged type", () => {
    expectTypeOf(Eq.tagged(UserId, Eq.number)).toEqualTypeOf<Equivalence<UserId>>();
    expectTypeOf(Order.tagged(UserId, Order.number).lessThan).parameter(0).toEqualTypeOf<UserId>();
  });

  it("literal constructors return the tagged type", () => {
    expectTypeOf(Literal.tagged(UserId, Literal.integerLiteral)).returns.toEqualTypeOf<UserId>();
  });

  it("presets produce their tagged type", () => {
    const Meters = numberTag<"Meters">();
    expectTypeOf<TaggedOf<typeof Meters>>().toEqualTypeOf<Tagged<"Meters", number>>();
    expectTypeOf(Meters.zero).toEqualTypeOf<Tagged<"Meters", number>>();
    expectTypeOf(Meters.distance).returns.toEqualTypeOf<number>();
  });
});
