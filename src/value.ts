/**
 * Runtime values for the script evaluator.
 */

import { toBool } from "./coerce";
import {
  NumericType,
  TypedNumeric,
  convert,
  formatNumber,
  fromBigInt,
  fromNumber,
  integerFits,
  isFloatType,
  numericToString,
} from "./numeric";
import type { ScriptType } from "./expr";

// ============================================================================
// Value Types
// ============================================================================

/**
 * Anything an expression can produce. Literals stay untyped until they are
 * bound, cast or compared against a typed value.
 */
export type Value = TypedNumeric | BoolValue | IntLiteralValue | FloatLiteralValue;

/** Values that can live in a variable: every literal has been given a type. */
export type BoundValue = TypedNumeric | BoolValue;

export type LiteralValue = IntLiteralValue | FloatLiteralValue;

export interface BoolValue {
  readonly tag: "bool";
  readonly value: boolean;
}

export interface IntLiteralValue {
  readonly tag: "intLiteral";
  readonly value: bigint;
}

export interface FloatLiteralValue {
  readonly tag: "floatLiteral";
  readonly value: number;
}

// ============================================================================
// Constructors
// ============================================================================

export const boolVal = (value: boolean): BoolValue => ({ tag: "bool", value });
export const intLiteral = (value: bigint): IntLiteralValue => ({ tag: "intLiteral", value });
export const floatLiteral = (value: number): FloatLiteralValue => ({ tag: "floatLiteral", value });

export function isLiteral(value: Value): value is LiteralValue {
  return value.tag === "intLiteral" || value.tag === "floatLiteral";
}

export function isNumeric(value: Value): value is TypedNumeric {
  return value.tag !== "bool" && !isLiteral(value);
}

/**
 * Name of a value's type, as used in error messages.
 */
export function typeName(value: Value): string {
  switch (value.tag) {
    case "intLiteral":
      return "integer literal";
    case "floatLiteral":
      return "float literal";
    default:
      return value.tag;
  }
}

// ============================================================================
// Literal Typing
// ============================================================================

/**
 * Give a literal the given type without changing its value.
 * Returns null when the literal is out of range, or is a float literal and
 * the type is an integer type.
 */
export function fitLiteral(literal: LiteralValue, type: NumericType): TypedNumeric | null {
  if (literal.tag === "floatLiteral") {
    return isFloatType(type) ? fromNumber(type, literal.value) : null;
  }
  if (isFloatType(type)) return fromBigInt(type, literal.value);
  return integerFits(type, literal.value) ? fromBigInt(type, literal.value) : null;
}

const DEFAULT_INTEGER_TYPES: NumericType[] = ["i32", "i64", "u64"];

/**
 * The type a literal takes when nothing else decides it: the narrowest of
 * i32, i64, u64 for integers, f64 for floats. Null when an integer literal
 * fits none of them.
 */
export function defaultTyped(literal: LiteralValue): TypedNumeric | null {
  if (literal.tag === "floatLiteral") return fromNumber("f64", literal.value);
  for (const type of DEFAULT_INTEGER_TYPES) {
    const typed = fitLiteral(literal, type);
    if (typed) return typed;
  }
  return null;
}

// ============================================================================
// Truth and Casts
// ============================================================================

/**
 * Truth value of any value. Literals follow the same rules as typed values:
 * nonzero integers are true, floats are true unless zero or NaN.
 */
export function truthOf(value: Value): boolean {
  switch (value.tag) {
    case "bool":
      return value.value;
    case "intLiteral":
      return value.value !== 0n;
    case "floatLiteral":
      return toBool(fromNumber("f64", value.value));
    default:
      return toBool(value);
  }
}

/**
 * Explicit cast (`<T>x`). Never fails: integers wrap, floats truncate,
 * `bool` goes through the truth rules and converts back as 1 or 0.
 */
export function castValue(value: Value, type: ScriptType): BoundValue {
  if (type === "bool") return boolVal(truthOf(value));
  switch (value.tag) {
    case "bool":
      return fromBigInt(type, value.value ? 1n : 0n);
    case "intLiteral":
      return fromBigInt(type, value.value);
    case "floatLiteral":
      return fromNumber(type, value.value);
    default:
      return convert(value, type);
  }
}

// ============================================================================
// Pretty Printing
// ============================================================================

export function valueToString(value: Value): string {
  switch (value.tag) {
    case "bool":
      return String(value.value);
    case "intLiteral":
      return value.value.toString();
    case "floatLiteral":
      return formatNumber(value.value);
    default:
      return numericToString(value);
  }
}
