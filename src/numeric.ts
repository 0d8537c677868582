/**
 * Typed numeric values.
 *
 * Every value carries the tag of its concrete type. Payloads are kept
 * normalised to the width and signedness of the tag, so constructing a value
 * never produces something the type cannot represent.
 */

// ============================================================================
// Value Types
// ============================================================================

export type TypedNumeric =
  | I32Value
  | I64Value
  | U8Value
  | U32Value
  | U64Value
  | F32Value
  | F64Value;

export type NumericType = TypedNumeric["tag"];

export interface I32Value {
  readonly tag: "i32";
  readonly value: number;
}

export interface I64Value {
  readonly tag: "i64";
  readonly value: bigint;
}

export interface U8Value {
  readonly tag: "u8";
  readonly value: number;
}

export interface U32Value {
  readonly tag: "u32";
  readonly value: number;
}

export interface U64Value {
  readonly tag: "u64";
  readonly value: bigint;
}

export interface F32Value {
  readonly tag: "f32";
  readonly value: number;
}

export interface F64Value {
  readonly tag: "f64";
  readonly value: number;
}

export type IntegerValue = I32Value | I64Value | U8Value | U32Value | U64Value;
export type FloatValue = F32Value | F64Value;

export const NUMERIC_TYPES: readonly NumericType[] = ["i32", "i64", "u8", "u32", "u64", "f32", "f64"];

export function isNumericType(name: string): name is NumericType {
  return NUMERIC_TYPES.some(type => type === name);
}

export function isFloatType(type: NumericType): type is FloatValue["tag"] {
  return type === "f32" || type === "f64";
}

export function isFloat(value: TypedNumeric): value is FloatValue {
  return isFloatType(value.tag);
}

export function isInteger(value: TypedNumeric): value is IntegerValue {
  return !isFloat(value);
}

// ============================================================================
// Constructors
// ============================================================================

// Integer constructors wrap out-of-range input the way a fixed-width
// register would. Non-integral input is truncated toward zero first.

function truncate(value: number): number {
  return Number.isFinite(value) ? Math.trunc(value) : 0;
}

export const i32Val = (value: number): I32Value => ({ tag: "i32", value: Number(BigInt.asIntN(32, BigInt(truncate(value)))) });
export const u8Val = (value: number): U8Value => ({ tag: "u8", value: Number(BigInt.asUintN(8, BigInt(truncate(value)))) });
export const u32Val = (value: number): U32Value => ({ tag: "u32", value: Number(BigInt.asUintN(32, BigInt(truncate(value)))) });
export const i64Val = (value: bigint): I64Value => ({ tag: "i64", value: BigInt.asIntN(64, value) });
export const u64Val = (value: bigint): U64Value => ({ tag: "u64", value: BigInt.asUintN(64, value) });
export const f32Val = (value: number): F32Value => ({ tag: "f32", value: Math.fround(value) });
export const f64Val = (value: number): F64Value => ({ tag: "f64", value });

const F32_SIGNIFICAND_BITS = 24;

/**
 * Round an exact integer to the nearest f32, ties to even. Going through
 * Number() first would round twice once the integer needs more than 53 bits.
 */
function bigIntToF32(value: bigint): number {
  const magnitude = value < 0n ? -value : value;
  const shift = magnitude.toString(2).length - F32_SIGNIFICAND_BITS;
  if (shift <= 0) return Number(value);
  const unit = 1n << BigInt(shift);
  const half = unit >> 1n;
  let significand = magnitude >> BigInt(shift);
  const remainder = magnitude - significand * unit;
  if (remainder > half || (remainder === half && (significand & 1n) === 1n)) {
    significand += 1n;
  }
  const rounded = Math.fround(Number(significand * unit));
  return value < 0n ? -rounded : rounded;
}

/**
 * Build a value of the given type from an exact integer, wrapping it to the
 * type's width. Float targets round to the nearest representable value.
 */
export function fromBigInt(type: NumericType, value: bigint): TypedNumeric {
  switch (type) {
    case "i32":
      return { tag: "i32", value: Number(BigInt.asIntN(32, value)) };
    case "u8":
      return { tag: "u8", value: Number(BigInt.asUintN(8, value)) };
    case "u32":
      return { tag: "u32", value: Number(BigInt.asUintN(32, value)) };
    case "i64":
      return i64Val(value);
    case "u64":
      return u64Val(value);
    case "f32":
      return { tag: "f32", value: bigIntToF32(value) };
    case "f64":
      return f64Val(Number(value));
  }
}

/**
 * Build a value of the given type from a JS number. Integer targets truncate
 * toward zero and wrap; NaN and the infinities become 0.
 */
export function fromNumber(type: NumericType, value: number): TypedNumeric {
  switch (type) {
    case "f32":
      return f32Val(value);
    case "f64":
      return f64Val(value);
    default:
      return fromBigInt(type, BigInt(truncate(value)));
  }
}

// ============================================================================
// Ranges and Constants
// ============================================================================

export interface IntegerRange {
  min: bigint;
  max: bigint;
}

export const INTEGER_RANGES: Record<IntegerValue["tag"], IntegerRange> = {
  i32: { min: -(2n ** 31n), max: 2n ** 31n - 1n },
  i64: { min: -(2n ** 63n), max: 2n ** 63n - 1n },
  u8: { min: 0n, max: 2n ** 8n - 1n },
  u32: { min: 0n, max: 2n ** 32n - 1n },
  u64: { min: 0n, max: 2n ** 64n - 1n },
};

export function integerFits(type: IntegerValue["tag"], value: bigint): boolean {
  const range = INTEGER_RANGES[type];
  return value >= range.min && value <= range.max;
}

export type ConstantName =
  | "MIN_VALUE"
  | "MAX_VALUE"
  | "MIN_NORMAL_VALUE"
  | "EPSILON"
  | "MIN_SAFE_INTEGER"
  | "MAX_SAFE_INTEGER";

const CONSTANT_NAMES: readonly ConstantName[] = [
  "MIN_VALUE",
  "MAX_VALUE",
  "MIN_NORMAL_VALUE",
  "EPSILON",
  "MIN_SAFE_INTEGER",
  "MAX_SAFE_INTEGER",
];

function isConstantName(name: string): name is ConstantName {
  return CONSTANT_NAMES.some(constantName => constantName === name);
}

// MIN_VALUE of a float type is its smallest positive subnormal, the same
// convention as Number.MIN_VALUE.
const FLOAT_CONSTANTS: Record<FloatValue["tag"], Record<ConstantName, number>> = {
  f32: {
    MIN_VALUE: 1.401298464324817e-45,
    MAX_VALUE: 3.4028234663852886e38,
    MIN_NORMAL_VALUE: 1.1754943508222875e-38,
    EPSILON: 1.1920928955078125e-7,
    MIN_SAFE_INTEGER: -16777215,
    MAX_SAFE_INTEGER: 16777215,
  },
  f64: {
    MIN_VALUE: Number.MIN_VALUE,
    MAX_VALUE: Number.MAX_VALUE,
    MIN_NORMAL_VALUE: 2.2250738585072014e-308,
    EPSILON: Number.EPSILON,
    MIN_SAFE_INTEGER: Number.MIN_SAFE_INTEGER,
    MAX_SAFE_INTEGER: Number.MAX_SAFE_INTEGER,
  },
};

export class UnknownConstantError extends Error {
  constructor(public type: NumericType, public constantName: string) {
    super(`${type} has no constant ${constantName}`);
    this.name = "UnknownConstantError";
  }
}

/**
 * Look up a named constant such as `f32.MAX_VALUE` or `i64.MIN_VALUE`.
 */
export function constant(type: NumericType, name: string): TypedNumeric {
  if (isFloatType(type)) {
    if (!isConstantName(name)) throw new UnknownConstantError(type, name);
    return fromNumber(type, FLOAT_CONSTANTS[type][name]);
  }
  const range = INTEGER_RANGES[type];
  switch (name) {
    case "MIN_VALUE":
      return fromBigInt(type, range.min);
    case "MAX_VALUE":
      return fromBigInt(type, range.max);
    default:
      throw new UnknownConstantError(type, name);
  }
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Unary negation. Integers wrap within their width; floats flip the sign bit
 * and keep the magnitude, so -MAX_VALUE stays finite and -MIN_VALUE nonzero.
 */
export function neg(value: TypedNumeric): TypedNumeric {
  switch (value.tag) {
    case "i32":
    case "u8":
    case "u32":
      return fromBigInt(value.tag, -BigInt(value.value));
    case "i64":
      return i64Val(-value.value);
    case "u64":
      return u64Val(-value.value);
    case "f32":
      return { tag: "f32", value: -value.value };
    case "f64":
      return { tag: "f64", value: -value.value };
  }
}

/**
 * Explicit conversion between numeric types.
 *
 * int -> int wraps, int -> float rounds to nearest, float -> int truncates
 * toward zero and wraps (NaN and infinities give 0), float -> float rounds
 * or widens exactly.
 */
export function convert(value: TypedNumeric, target: NumericType): TypedNumeric {
  if (value.tag === target) return value;
  switch (value.tag) {
    case "i64":
    case "u64":
      return fromBigInt(target, value.value);
    case "i32":
    case "u8":
    case "u32":
      return isFloatType(target) ? fromNumber(target, value.value) : fromBigInt(target, BigInt(value.value));
    case "f32":
    case "f64":
      return fromNumber(target, value.value);
  }
}

/**
 * IEEE-style equality of two values of the same type: NaN equals nothing and
 * the two zeros are equal.
 */
export function numericEquals(a: TypedNumeric, b: TypedNumeric): boolean {
  return a.tag === b.tag && a.value === b.value;
}

// ============================================================================
// Pretty Printing
// ============================================================================

export function formatNumber(value: number): string {
  return Object.is(value, -0) ? "-0" : String(value);
}

export function numericToString(value: TypedNumeric): string {
  const payload = typeof value.value === "bigint" ? value.value.toString() : formatNumber(value.value);
  return `<${value.tag}>${payload}`;
}
