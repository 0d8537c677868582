/**
 * AST for conformance scripts.
 *
 * A script is a flat list of variable declarations and assertions over
 * typed numeric expressions.
 */

import { NumericType, formatNumber } from "./numeric";

// ============================================================================
// Script Types
// ============================================================================

/** Types a script can name: the numeric types plus `bool`. */
export type ScriptType = NumericType | "bool";

// ============================================================================
// Expression Types
// ============================================================================

export type Expr =
  | IntLitExpr
  | FloatLitExpr
  | BoolLitExpr
  | VarExpr
  | CastExpr
  | UnaryOpExpr
  | BinOpExpr
  | ReinterpretExpr
  | ConstantExpr;

/** Integer literal, kept exact. */
export interface IntLitExpr {
  tag: "int";
  value: bigint;
}

/** Float literal, including NaN and Infinity. */
export interface FloatLitExpr {
  tag: "float";
  value: number;
}

export interface BoolLitExpr {
  tag: "bool";
  value: boolean;
}

export interface VarExpr {
  tag: "var";
  name: string;
}

/**
 * Explicit cast: `<f32>x` or `x as f32`.
 */
export interface CastExpr {
  tag: "cast";
  type: ScriptType;
  operand: Expr;
}

export interface UnaryOpExpr {
  tag: "unary";
  op: UnaryOp;
  operand: Expr;
}

export type UnaryOp = "-" | "+" | "!";

export interface BinOpExpr {
  tag: "binop";
  op: BinOp;
  left: Expr;
  right: Expr;
}

export type BinOp =
  // Literal folding
  | "+"
  | "-"
  // Comparison
  | "=="
  | "!=";

/**
 * `reinterpret<f32>(bits)`: copy the operand's bits into the target type.
 */
export interface ReinterpretExpr {
  tag: "reinterpret";
  type: NumericType;
  operand: Expr;
}

/**
 * Named constant of a numeric type, e.g. `f64.MAX_VALUE`.
 */
export interface ConstantExpr {
  tag: "constant";
  type: NumericType;
  name: string;
}

// ============================================================================
// Statement Types
// ============================================================================

export type Stmt = VarStmt | AssertStmt;

export interface VarStmt {
  tag: "var";
  name: string;
  declaredType?: ScriptType;
  init: Expr;
  line: number;
}

export interface AssertStmt {
  tag: "assert";
  cond: Expr;
  message?: string;
  line: number;
  /** Source text of the condition, for reports. */
  source: string;
}

export interface Script {
  statements: Stmt[];
}

// ============================================================================
// Constructors
// ============================================================================

export const int = (value: bigint | number): IntLitExpr => ({ tag: "int", value: BigInt(value) });
export const float = (value: number): FloatLitExpr => ({ tag: "float", value });
export const bool = (value: boolean): BoolLitExpr => ({ tag: "bool", value });
export const varRef = (name: string): VarExpr => ({ tag: "var", name });
export const cast = (type: ScriptType, operand: Expr): CastExpr => ({ tag: "cast", type, operand });
export const negExpr = (operand: Expr): UnaryOpExpr => ({ tag: "unary", op: "-", operand });
export const plusExpr = (operand: Expr): UnaryOpExpr => ({ tag: "unary", op: "+", operand });
export const notExpr = (operand: Expr): UnaryOpExpr => ({ tag: "unary", op: "!", operand });
export const add = (left: Expr, right: Expr): BinOpExpr => ({ tag: "binop", op: "+", left, right });
export const sub = (left: Expr, right: Expr): BinOpExpr => ({ tag: "binop", op: "-", left, right });
export const eq = (left: Expr, right: Expr): BinOpExpr => ({ tag: "binop", op: "==", left, right });
export const neq = (left: Expr, right: Expr): BinOpExpr => ({ tag: "binop", op: "!=", left, right });
export const reinterpretExpr = (type: NumericType, operand: Expr): ReinterpretExpr => ({ tag: "reinterpret", type, operand });
export const constantExpr = (type: NumericType, name: string): ConstantExpr => ({ tag: "constant", type, name });

// ============================================================================
// Pretty Printing
// ============================================================================

export function exprToString(expr: Expr): string {
  switch (expr.tag) {
    case "int":
      return expr.value.toString();

    case "float":
      return formatNumber(expr.value);

    case "bool":
      return String(expr.value);

    case "var":
      return expr.name;

    case "cast":
      return `<${expr.type}>${exprToString(expr.operand)}`;

    case "unary":
      return `${expr.op}${exprToString(expr.operand)}`;

    case "binop":
      return `(${exprToString(expr.left)} ${expr.op} ${exprToString(expr.right)})`;

    case "reinterpret":
      return `reinterpret<${expr.type}>(${exprToString(expr.operand)})`;

    case "constant":
      return `${expr.type}.${expr.name}`;
  }
}

export function stmtToString(stmt: Stmt): string {
  switch (stmt.tag) {
    case "var": {
      const annotation = stmt.declaredType ? `: ${stmt.declaredType}` : "";
      return `var ${stmt.name}${annotation} = ${exprToString(stmt.init)};`;
    }
    case "assert":
      return stmt.message === undefined
        ? `assert(${exprToString(stmt.cond)});`
        : `assert(${exprToString(stmt.cond)}, ${JSON.stringify(stmt.message)});`;
  }
}
