/**
 * Evaluator for conformance scripts.
 *
 * Runs declarations and assertions in order against a single environment and
 * collects the outcome of every assertion into a report.
 */

import { AssertStmt, BinOp, Expr, Script, Stmt, UnaryOp, VarStmt } from "./expr";
import {
  NumericType,
  TypedNumeric,
  UnknownConstantError,
  constant,
  fromBigInt,
  fromNumber,
  integerFits,
  neg,
  numericEquals,
} from "./numeric";
import { ReinterpretError, reinterpret } from "./reinterpret";
import { parseScript } from "./script";
import {
  BoundValue,
  LiteralValue,
  Value,
  boolVal,
  castValue,
  defaultTyped,
  fitLiteral,
  floatLiteral,
  intLiteral,
  isLiteral,
  isNumeric,
  truthOf,
  typeName,
  valueToString,
} from "./value";

// ============================================================================
// Results
// ============================================================================

export interface AssertionResult {
  line: number;
  /** Source text of the asserted condition */
  source: string;
  passed: boolean;
  message?: string;
}

export interface CheckReport {
  assertions: AssertionResult[];
  passed: number;
  failed: number;
  /** Variables as they stand after the last statement */
  bindings: Map<string, BoundValue>;
}

export interface CheckOptions {
  /** Throw an AssertionError at the first failing assertion */
  failFast?: boolean;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Error thrown when a script uses a value at the wrong type.
 */
export class ScriptTypeError extends Error {
  constructor(
    public detail: string,
    public line: number
  ) {
    super(`line ${line}: ${detail}`);
    this.name = "ScriptTypeError";
  }
}

/**
 * Error thrown for a failing assertion when running with failFast.
 */
export class AssertionError extends Error {
  constructor(public result: AssertionResult) {
    super(`line ${result.line}: assertion failed: ${result.message ?? result.source}`);
    this.name = "AssertionError";
  }
}

// ============================================================================
// Evaluator
// ============================================================================

// Integer literals passed to reinterpret<T>() are read as unsigned bit
// patterns of the target width; signed spellings are accepted too.
const BIT_PATTERN_TYPES: Partial<Record<NumericType, { unsigned: "u32" | "u64"; signed: "i32" | "i64" }>> = {
  f32: { unsigned: "u32", signed: "i32" },
  f64: { unsigned: "u64", signed: "i64" },
};

export class ScriptEvaluator {
  private env = new Map<string, BoundValue>();
  private assertions: AssertionResult[] = [];
  private line = 0;

  constructor(private options: CheckOptions = {}) {}

  run(script: Script): CheckReport {
    for (const stmt of script.statements) {
      this.execute(stmt);
    }
    const passed = this.assertions.filter(a => a.passed).length;
    return {
      assertions: [...this.assertions],
      passed,
      failed: this.assertions.length - passed,
      bindings: new Map(this.env),
    };
  }

  execute(stmt: Stmt): void {
    this.line = stmt.line;
    switch (stmt.tag) {
      case "var":
        this.declare(stmt);
        break;
      case "assert":
        this.check(stmt);
        break;
    }
  }

  evaluate(expr: Expr): Value {
    switch (expr.tag) {
      case "int":
        return intLiteral(expr.value);

      case "float":
        return floatLiteral(expr.value);

      case "bool":
        return boolVal(expr.value);

      case "var": {
        const value = this.env.get(expr.name);
        if (value === undefined) {
          throw this.error(`Undefined variable: ${expr.name}`);
        }
        return value;
      }

      case "cast":
        return castValue(this.evaluate(expr.operand), expr.type);

      case "unary":
        return this.evalUnary(expr.op, this.evaluate(expr.operand));

      case "binop":
        return this.evalBinOp(expr.op, this.evaluate(expr.left), this.evaluate(expr.right));

      case "reinterpret":
        return this.evalReinterpret(expr.type, this.evaluate(expr.operand));

      case "constant":
        try {
          return constant(expr.type, expr.name);
        } catch (err) {
          if (err instanceof UnknownConstantError) throw this.error(err.message);
          throw err;
        }
    }
  }

  // --------------------------------------------------------------------------
  // Statements
  // --------------------------------------------------------------------------

  private declare(stmt: VarStmt): void {
    if (this.env.has(stmt.name)) {
      throw this.error(`Variable ${stmt.name} is already declared`);
    }
    const value = this.evaluate(stmt.init);
    this.env.set(stmt.name, stmt.declaredType ? this.assign(value, stmt.declaredType) : this.settle(value));
  }

  private check(stmt: AssertStmt): void {
    const result: AssertionResult = {
      line: stmt.line,
      source: stmt.source,
      passed: truthOf(this.evaluate(stmt.cond)),
    };
    if (stmt.message !== undefined) result.message = stmt.message;
    this.assertions.push(result);
    if (!result.passed && this.options.failFast) {
      throw new AssertionError(result);
    }
  }

  /**
   * Check a value against a declared type. Literals must fit the type
   * exactly; typed values must already have it.
   */
  private assign(value: Value, type: NumericType | "bool"): BoundValue {
    if (type === "bool") {
      if (value.tag === "bool") return value;
      throw this.error(`Cannot assign ${typeName(value)} to bool`);
    }
    if (isLiteral(value)) return this.fit(value, type);
    if (value.tag !== type) {
      throw this.error(`Cannot assign ${typeName(value)} to ${type}`);
    }
    return value;
  }

  /**
   * Give an unannotated value its type.
   */
  private settle(value: Value): BoundValue {
    if (!isLiteral(value)) return value;
    const typed = defaultTyped(value);
    if (!typed) {
      throw this.error(`Integer literal ${valueToString(value)} does not fit any integer type`);
    }
    return typed;
  }

  private fit(literal: LiteralValue, type: NumericType): TypedNumeric {
    const typed = fitLiteral(literal, type);
    if (!typed) {
      throw this.error(`${typeName(literal)} ${valueToString(literal)} does not fit ${type}`);
    }
    return typed;
  }

  // --------------------------------------------------------------------------
  // Operators
  // --------------------------------------------------------------------------

  private evalUnary(op: UnaryOp, operand: Value): Value {
    if (op === "!") return boolVal(!truthOf(operand));
    switch (operand.tag) {
      case "bool":
        throw this.error(`Unary ${op} needs a numeric operand, got bool`);
      case "intLiteral":
        return op === "-" ? intLiteral(-operand.value) : operand;
      case "floatLiteral":
        return op === "-" ? floatLiteral(-operand.value) : operand;
      default:
        return op === "-" ? neg(operand) : operand;
    }
  }

  private evalBinOp(op: BinOp, left: Value, right: Value): Value {
    switch (op) {
      case "+":
      case "-":
        return this.fold(op, left, right);
      case "==":
        return boolVal(this.equals(left, right));
      case "!=":
        return boolVal(!this.equals(left, right));
    }
  }

  /**
   * Constant folding of `+` and `-` between untyped literals, so scripts can
   * spell bit patterns such as `0x7F800000 - 1`.
   */
  private fold(op: "+" | "-", left: Value, right: Value): Value {
    if (!isLiteral(left) || !isLiteral(right)) {
      throw this.error(
        `Binary ${op} is only supported between untyped literals, got ${typeName(left)} and ${typeName(right)}`
      );
    }
    if (left.tag === "intLiteral" && right.tag === "intLiteral") {
      return intLiteral(op === "+" ? left.value + right.value : left.value - right.value);
    }
    const a = Number(left.value);
    const b = Number(right.value);
    return floatLiteral(op === "+" ? a + b : a - b);
  }

  /**
   * IEEE-style equality. Both sides must have the same type once literals
   * have been fitted to the typed side.
   */
  private equals(left: Value, right: Value): boolean {
    if (left.tag === "bool" || right.tag === "bool") {
      if (left.tag === "bool" && right.tag === "bool") return left.value === right.value;
      throw this.error(`Cannot compare ${typeName(left)} with ${typeName(right)}`);
    }
    if (isLiteral(left) && isLiteral(right)) {
      if (left.tag === "intLiteral" && right.tag === "intLiteral") return left.value === right.value;
      return Number(left.value) === Number(right.value);
    }
    const a = isLiteral(left) && isNumeric(right) ? this.fit(left, right.tag) : left;
    const b = isLiteral(right) && isNumeric(left) ? this.fit(right, left.tag) : right;
    if (!isNumeric(a) || !isNumeric(b) || a.tag !== b.tag) {
      throw this.error(`Cannot compare ${typeName(a)} with ${typeName(b)}`);
    }
    return numericEquals(a, b);
  }

  private evalReinterpret(type: NumericType, operand: Value): TypedNumeric {
    if (operand.tag === "bool") {
      throw this.error(`Cannot reinterpret bool as ${type}`);
    }
    const source = isLiteral(operand) ? this.bitSource(type, operand) : operand;
    try {
      return reinterpret(type, source);
    } catch (err) {
      if (err instanceof ReinterpretError) throw this.error(err.message);
      throw err;
    }
  }

  /**
   * Type a literal operand of reinterpret<T>(): integer literals become bit
   * patterns of T's width, float literals become floats of T's width. Only
   * the 32- and 64-bit types take literals.
   */
  private bitSource(type: NumericType, literal: LiteralValue): TypedNumeric {
    const patterns = BIT_PATTERN_TYPES[type];
    if (patterns) {
      if (literal.tag === "floatLiteral") {
        throw this.error(`reinterpret<${type}> needs an integer bit pattern, got float literal`);
      }
      if (!integerFits(patterns.unsigned, literal.value) && !integerFits(patterns.signed, literal.value)) {
        throw this.error(`Bit pattern ${valueToString(literal)} does not fit ${patterns.unsigned}`);
      }
      return fromBigInt(patterns.unsigned, literal.value);
    }
    if (type !== "i32" && type !== "u32" && type !== "i64" && type !== "u64") {
      throw this.error(`Cannot reinterpret ${typeName(literal)} ${valueToString(literal)} as ${type}`);
    }
    const floatType = type === "i32" || type === "u32" ? "f32" : "f64";
    if (literal.tag === "intLiteral") return fromBigInt(floatType, literal.value);
    return fromNumber(floatType, literal.value);
  }

  private error(message: string): ScriptTypeError {
    return new ScriptTypeError(message, this.line);
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

export function evaluateScript(script: Script, options: CheckOptions = {}): CheckReport {
  return new ScriptEvaluator(options).run(script);
}

/**
 * Parse and run a conformance script.
 */
export function checkScript(source: string, options: CheckOptions = {}): CheckReport {
  return evaluateScript(parseScript(source), options);
}

