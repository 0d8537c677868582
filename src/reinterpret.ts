/**
 * Bit reinterpretation between integer and float types.
 *
 * Bits are copied through a DataView, never converted arithmetically:
 * reinterpret32(0x3f800000) is 1.0, not 1065353216.0.
 */

import { F32Value, F64Value, NumericType, TypedNumeric, fromBigInt } from "./numeric";

// Scratch storage shared by every call. Each call writes then reads it
// synchronously, so no two calls ever observe each other's bits.
const scratch = new DataView(new ArrayBuffer(8));

/**
 * Reinterpret a 32-bit pattern as an f32. Any number is first reduced to an
 * unsigned 32-bit pattern with `>>> 0`: fractions are truncated, values
 * outside 32 bits wrap, and NaN and the infinities become 0.
 */
export function reinterpret32(bits: number): F32Value {
  scratch.setUint32(0, bits >>> 0);
  return { tag: "f32", value: scratch.getFloat32(0) };
}

/**
 * Reinterpret a 64-bit pattern as an f64. Any bigint is first reduced to an
 * unsigned 64-bit pattern.
 */
export function reinterpret64(bits: bigint): F64Value {
  scratch.setBigUint64(0, BigInt.asUintN(64, bits));
  return { tag: "f64", value: scratch.getFloat64(0) };
}

/** The raw binary32 encoding of an f32, as an unsigned 32-bit integer. */
export function bitsOf32(value: F32Value): number {
  scratch.setFloat32(0, value.value);
  return scratch.getUint32(0);
}

/** The raw binary64 encoding of an f64, as an unsigned 64-bit integer. */
export function bitsOf64(value: F64Value): bigint {
  scratch.setFloat64(0, value.value);
  return scratch.getBigUint64(0);
}

export class ReinterpretError extends Error {
  constructor(public from: NumericType, public to: NumericType) {
    super(`Cannot reinterpret ${from} as ${to}: widths or kinds do not match`);
    this.name = "ReinterpretError";
  }
}

/**
 * Reinterpret a value as another type of the same width.
 *
 * Supported pairs: i32/u32 <-> f32 and i64/u64 <-> f64.
 */
export function reinterpret(target: NumericType, value: TypedNumeric): TypedNumeric {
  switch (target) {
    case "f32":
      if (value.tag === "i32" || value.tag === "u32") return reinterpret32(value.value);
      break;
    case "f64":
      if (value.tag === "i64" || value.tag === "u64") return reinterpret64(value.value);
      break;
    case "i32":
    case "u32":
      if (value.tag === "f32") return fromBigInt(target, BigInt(bitsOf32(value)));
      break;
    case "i64":
    case "u64":
      if (value.tag === "f64") return fromBigInt(target, bitsOf64(value));
      break;
  }
  throw new ReinterpretError(value.tag, target);
}
