/**
 * Boolean coercion of typed numeric values.
 */

import { TypedNumeric } from "./numeric";

/**
 * The truth value of a numeric value.
 *
 * Integers are true when nonzero, whatever their sign. Floats are true unless
 * they compare equal to 0.0 or are NaN; this goes through IEEE comparison
 * rather than the bit pattern so that -0.0 is false like +0.0, and every NaN
 * payload is false regardless of its sign bit.
 */
export function toBool(value: TypedNumeric): boolean {
  switch (value.tag) {
    case "i32":
    case "u8":
    case "u32":
      return value.value !== 0;

    case "i64":
    case "u64":
      return value.value !== 0n;

    case "f32":
    case "f64":
      return !(value.value === 0 || Number.isNaN(value.value));
  }
}
