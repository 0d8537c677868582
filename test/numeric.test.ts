/**
 * Tests for typed numeric construction, negation and conversion.
 */
import { describe, it, expect } from "vitest";

import {
  i32Val,
  i64Val,
  u8Val,
  u32Val,
  u64Val,
  f32Val,
  f64Val,
  fromBigInt,
  fromNumber,
  constant,
  UnknownConstantError,
  neg,
  convert,
  numericEquals,
  numericToString,
  integerFits,
  isNumericType,
  isFloat,
  isInteger,
} from "../src/index";

describe("Constructors", () => {
  it("wrap integers to their width", () => {
    expect(i32Val(2 ** 31)).toEqual({ tag: "i32", value: -2147483648 });
    expect(u8Val(258)).toEqual({ tag: "u8", value: 2 });
    expect(u8Val(-1)).toEqual({ tag: "u8", value: 255 });
    expect(u32Val(-1)).toEqual({ tag: "u32", value: 4294967295 });
    expect(i64Val(2n ** 63n)).toEqual({ tag: "i64", value: -(2n ** 63n) });
    expect(u64Val(-1n)).toEqual({ tag: "u64", value: 18446744073709551615n });
  });

  it("truncate fractional input toward zero", () => {
    expect(i32Val(2.9)).toEqual({ tag: "i32", value: 2 });
    expect(i32Val(-2.9)).toEqual({ tag: "i32", value: -2 });
  });

  it("round f32 payloads to single precision", () => {
    expect(f32Val(0.1).value).toBe(0.10000000149011612);
    expect(f32Val(1e39).value).toBe(Infinity);
  });

  it("keep f64 payloads as given", () => {
    expect(f64Val(0.1).value).toBe(0.1);
  });

  it("fromBigInt and fromNumber build any type", () => {
    expect(fromBigInt("u32", -1n)).toEqual({ tag: "u32", value: 4294967295 });
    expect(fromBigInt("f64", 2n ** 53n + 1n)).toEqual({ tag: "f64", value: 9007199254740992 });
    expect(fromNumber("i64", -3.5)).toEqual({ tag: "i64", value: -3n });
    expect(fromNumber("u8", NaN)).toEqual({ tag: "u8", value: 0 });
  });
});

describe("Type classification", () => {
  it("recognises numeric type names", () => {
    expect(isNumericType("u64")).toBe(true);
    expect(isNumericType("bool")).toBe(false);
    expect(isNumericType("i16")).toBe(false);
  });

  it("splits values into integers and floats", () => {
    expect(isFloat(f32Val(1))).toBe(true);
    expect(isInteger(f32Val(1))).toBe(false);
    expect(isInteger(u64Val(1n))).toBe(true);
  });

  it("checks integer ranges", () => {
    expect(integerFits("u8", 255n)).toBe(true);
    expect(integerFits("u8", 256n)).toBe(false);
    expect(integerFits("i32", -(2n ** 31n))).toBe(true);
    expect(integerFits("u32", -1n)).toBe(false);
  });
});

describe("Constants", () => {
  it("integer limits", () => {
    expect(constant("i32", "MIN_VALUE")).toEqual({ tag: "i32", value: -2147483648 });
    expect(constant("i32", "MAX_VALUE")).toEqual({ tag: "i32", value: 2147483647 });
    expect(constant("u8", "MAX_VALUE")).toEqual({ tag: "u8", value: 255 });
    expect(constant("u64", "MAX_VALUE")).toEqual({ tag: "u64", value: 18446744073709551615n });
    expect(constant("i64", "MIN_VALUE")).toEqual({ tag: "i64", value: -9223372036854775808n });
  });

  it("f32 limits are exactly representable in single precision", () => {
    for (const name of ["MIN_VALUE", "MAX_VALUE", "MIN_NORMAL_VALUE", "EPSILON"]) {
      const value = constant("f32", name).value;
      expect(typeof value).toBe("number");
      expect(Math.fround(Number(value))).toBe(value);
    }
  });

  it("f64 limits match Number", () => {
    expect(constant("f64", "MAX_VALUE").value).toBe(Number.MAX_VALUE);
    expect(constant("f64", "MIN_VALUE").value).toBe(Number.MIN_VALUE);
    expect(constant("f64", "EPSILON").value).toBe(Number.EPSILON);
  });

  it("MIN_VALUE is the smallest positive subnormal", () => {
    expect(constant("f32", "MIN_VALUE").value).toBe(2 ** -149);
    expect(constant("f64", "MIN_VALUE").value).toBe(2 ** -1074);
  });

  it("unknown names throw", () => {
    expect(() => constant("i32", "EPSILON")).toThrow(UnknownConstantError);
    expect(() => constant("f64", "NOPE")).toThrow("f64 has no constant NOPE");
  });
});

describe("neg", () => {
  it("wraps integers", () => {
    expect(neg(i32Val(5))).toEqual({ tag: "i32", value: -5 });
    expect(neg(constant("i32", "MIN_VALUE"))).toEqual({ tag: "i32", value: -2147483648 });
    expect(neg(u8Val(1))).toEqual({ tag: "u8", value: 255 });
    expect(neg(u32Val(1))).toEqual({ tag: "u32", value: 4294967295 });
    expect(neg(i64Val(-(2n ** 63n)))).toEqual({ tag: "i64", value: -(2n ** 63n) });
    expect(neg(u64Val(1n))).toEqual({ tag: "u64", value: 18446744073709551615n });
  });

  it("flips the sign of floats without changing magnitude", () => {
    const max = constant("f32", "MAX_VALUE");
    expect(neg(max)).toEqual({ tag: "f32", value: -3.4028234663852886e38 });
    const min = constant("f64", "MIN_VALUE");
    expect(neg(min)).toEqual({ tag: "f64", value: -5e-324 });
    expect(neg(f64Val(Infinity))).toEqual({ tag: "f64", value: -Infinity });
  });

  it("turns +0 into -0", () => {
    expect(Object.is(neg(f32Val(0)).value, -0)).toBe(true);
    expect(Object.is(neg(f64Val(-0)).value, 0)).toBe(true);
  });

  it("keeps NaN a NaN", () => {
    expect(Number.isNaN(neg(f32Val(NaN)).value)).toBe(true);
  });
});

describe("convert", () => {
  it("wraps between integer widths", () => {
    expect(convert(i32Val(-1), "u8")).toEqual({ tag: "u8", value: 255 });
    expect(convert(u64Val(2n ** 32n + 7n), "u32")).toEqual({ tag: "u32", value: 7 });
    expect(convert(i32Val(-1), "u64")).toEqual({ tag: "u64", value: 18446744073709551615n });
    expect(convert(u32Val(4294967295), "i32")).toEqual({ tag: "i32", value: -1 });
  });

  it("truncates floats toward zero", () => {
    expect(convert(f64Val(-7.9), "i32")).toEqual({ tag: "i32", value: -7 });
    expect(convert(f32Val(300.5), "u8")).toEqual({ tag: "u8", value: 44 });
  });

  it("sends NaN and infinities to zero", () => {
    expect(convert(f64Val(NaN), "i32")).toEqual({ tag: "i32", value: 0 });
    expect(convert(f64Val(Infinity), "u64")).toEqual({ tag: "u64", value: 0n });
  });

  it("converts integers to floats by value", () => {
    expect(convert(i32Val(2), "f32")).toEqual({ tag: "f32", value: 2 });
    expect(convert(u32Val(16777217), "f32")).toEqual({ tag: "f32", value: 16777216 });
    expect(convert(i64Val(-3n), "f64")).toEqual({ tag: "f64", value: -3 });
  });

  it("rounds wide integers to f32 in a single step", () => {
    // 2^60 + 2^36 + 1 is just above the midpoint between 2^60 and 2^60 + 2^37
    expect(convert(u64Val(2n ** 60n + 2n ** 36n + 1n), "f32")).toEqual({ tag: "f32", value: 2 ** 60 + 2 ** 37 });
    expect(convert(i64Val(-(2n ** 60n + 2n ** 36n + 1n)), "f32")).toEqual({
      tag: "f32",
      value: -(2 ** 60 + 2 ** 37),
    });
    expect(fromBigInt("f32", 2n ** 60n + 2n ** 36n + 1n).value).toBe(2 ** 60 + 2 ** 37);
  });

  it("breaks f32 ties toward an even significand", () => {
    expect(convert(u64Val(2n ** 60n + 2n ** 36n), "f32").value).toBe(2 ** 60);
    expect(convert(u64Val(2n ** 60n + 3n * 2n ** 36n), "f32").value).toBe(2 ** 60 + 2 ** 38);
    expect(convert(u64Val(2n ** 64n - 1n), "f32").value).toBe(2 ** 64);
  });

  it("rounds f64 to f32 and widens f32 exactly", () => {
    expect(convert(f64Val(0.1), "f32")).toEqual({ tag: "f32", value: 0.10000000149011612 });
    expect(convert(f32Val(0.1), "f64")).toEqual({ tag: "f64", value: 0.10000000149011612 });
    expect(convert(f64Val(Number.MAX_VALUE), "f32")).toEqual({ tag: "f32", value: Infinity });
  });

  it("returns the same value for the same type", () => {
    const v = i64Val(9n);
    expect(convert(v, "i64")).toBe(v);
  });
});

describe("numericEquals", () => {
  it("follows IEEE equality", () => {
    expect(numericEquals(f32Val(0), f32Val(-0))).toBe(true);
    expect(numericEquals(f64Val(NaN), f64Val(NaN))).toBe(false);
    expect(numericEquals(i64Val(3n), i64Val(3n))).toBe(true);
  });

  it("is false across types", () => {
    expect(numericEquals(i32Val(1), u32Val(1))).toBe(false);
  });
});

describe("numericToString", () => {
  it("prints the type and the payload", () => {
    expect(numericToString(i32Val(-4))).toBe("<i32>-4");
    expect(numericToString(u64Val(-1n))).toBe("<u64>18446744073709551615");
    expect(numericToString(f32Val(-0))).toBe("<f32>-0");
    expect(numericToString(f64Val(NaN))).toBe("<f64>NaN");
    expect(numericToString(f64Val(-Infinity))).toBe("<f64>-Infinity");
  });
});
