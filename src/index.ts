/**
 * Boolean coercion and bit reinterpretation for typed numeric values,
 * plus the conformance-script checker built on them.
 */

// Typed numerics
export {
  NUMERIC_TYPES,
  INTEGER_RANGES,
  isNumericType,
  isFloatType,
  isFloat,
  isInteger,
  i32Val,
  i64Val,
  u8Val,
  u32Val,
  u64Val,
  f32Val,
  f64Val,
  fromBigInt,
  fromNumber,
  integerFits,
  constant,
  UnknownConstantError,
  neg,
  convert,
  numericEquals,
  formatNumber,
  numericToString,
} from "./numeric";
export type {
  TypedNumeric,
  NumericType,
  IntegerValue,
  FloatValue,
  I32Value,
  I64Value,
  U8Value,
  U32Value,
  U64Value,
  F32Value,
  F64Value,
  IntegerRange,
  ConstantName,
} from "./numeric";

// Coercion
export { toBool } from "./coerce";

// Reinterpretation
export {
  reinterpret32,
  reinterpret64,
  bitsOf32,
  bitsOf64,
  reinterpret,
  ReinterpretError,
} from "./reinterpret";

// Script values
export {
  boolVal,
  intLiteral,
  floatLiteral,
  isLiteral,
  isNumeric,
  typeName,
  fitLiteral,
  defaultTyped,
  truthOf,
  castValue,
  valueToString,
} from "./value";
export type {
  Value,
  BoundValue,
  LiteralValue,
  BoolValue,
  IntLiteralValue,
  FloatLiteralValue,
} from "./value";

// Script AST
export {
  int,
  float,
  bool,
  varRef,
  cast,
  negExpr,
  plusExpr,
  notExpr,
  add,
  sub,
  eq,
  neq,
  reinterpretExpr,
  constantExpr,
  exprToString,
  stmtToString,
} from "./expr";
export type { Expr, Stmt, Script, ScriptType, BinOp, UnaryOp } from "./expr";

// Parser
export { parseScript, ParseError } from "./script";

// Evaluator
export {
  ScriptEvaluator,
  evaluateScript,
  checkScript,
  ScriptTypeError,
  AssertionError,
} from "./evaluate";
export type { CheckOptions, CheckReport, AssertionResult } from "./evaluate";

// Reports
export { formatReport, reportToJson } from "./report";
export type { JsonReport } from "./report";
