/**
 * Script parser - reads conformance scripts with the TypeScript parser.
 *
 * Scripts use TypeScript syntax, so `<f32>-0.0`, `x as u8` and
 * `reinterpret<f64>(0x7FF0000000000000)` all parse as ordinary type
 * assertions and generic calls. The resulting tree is then narrowed to the
 * small subset the evaluator understands.
 */

import * as ts from "typescript";
import {
  Expr,
  Script,
  ScriptType,
  Stmt,
  BinOp,
  bool,
  cast,
  constantExpr,
  float,
  int,
  negExpr,
  notExpr,
  plusExpr,
  reinterpretExpr,
  varRef,
} from "./expr";
import { NumericType, isNumericType } from "./numeric";

// ============================================================================
// Errors
// ============================================================================

export class ParseError extends Error {
  constructor(
    public detail: string,
    public line: number,
    public column: number
  ) {
    super(`${line}:${column}: ${detail}`);
    this.name = "ParseError";
  }
}

// ============================================================================
// Parsing
// ============================================================================

// Scripts are always parsed as .ts, never .tsx, so that `<T>x` is a cast.
const SCRIPT_FILE_NAME = "script.ts";

/**
 * Reject source the TypeScript parser reports syntax errors for.
 */
function checkSyntax(source: string): void {
  const { diagnostics } = ts.transpileModule(source, {
    fileName: SCRIPT_FILE_NAME,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2020,
      moduleDetection: ts.ModuleDetectionKind.Force,
    },
  });
  const error = diagnostics?.find(d => d.category === ts.DiagnosticCategory.Error);
  if (!error) return;

  const message = ts.flattenDiagnosticMessageText(error.messageText, "\n");
  if (error.file && error.start !== undefined) {
    const { line, character } = error.file.getLineAndCharacterOfPosition(error.start);
    throw new ParseError(message, line + 1, character + 1);
  }
  throw new ParseError(message, 1, 1);
}

/**
 * Parse a conformance script into statements.
 */
export function parseScript(source: string): Script {
  checkSyntax(source);
  const sf = ts.createSourceFile(SCRIPT_FILE_NAME, source, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);

  function position(node: ts.Node): ts.LineAndCharacter {
    return sf.getLineAndCharacterOfPosition(node.getStart(sf));
  }

  function fail(node: ts.Node, message: string): never {
    const { line, character } = position(node);
    throw new ParseError(message, line + 1, character + 1);
  }

  function parseType(node: ts.TypeNode): ScriptType {
    if (node.kind === ts.SyntaxKind.BooleanKeyword) return "bool";
    if (ts.isTypeReferenceNode(node) && ts.isIdentifier(node.typeName) && !node.typeArguments) {
      const name = node.typeName.text;
      if (name === "bool") return "bool";
      if (isNumericType(name)) return name;
    }
    return fail(node, `Unknown type: ${node.getText(sf)}`);
  }

  function parseNumericType(node: ts.TypeNode): NumericType {
    const type = parseType(node);
    if (type === "bool") return fail(node, "Expected a numeric type, got bool");
    return type;
  }

  function parseNumber(text: string): Expr {
    const digits = text.replace(/_/g, "");
    if (/^0[xXbBoO]/.test(digits) || /^[0-9]+$/.test(digits)) {
      return int(BigInt(digits));
    }
    return float(Number(digits));
  }

  function parseBinaryOp(token: ts.BinaryOperatorToken): BinOp {
    switch (token.kind) {
      case ts.SyntaxKind.PlusToken:
        return "+";
      case ts.SyntaxKind.MinusToken:
        return "-";
      case ts.SyntaxKind.EqualsEqualsToken:
      case ts.SyntaxKind.EqualsEqualsEqualsToken:
        return "==";
      case ts.SyntaxKind.ExclamationEqualsToken:
      case ts.SyntaxKind.ExclamationEqualsEqualsToken:
        return "!=";
      default:
        return fail(token, `Unsupported operator: ${token.getText(sf)}`);
    }
  }

  function parseExpr(n: ts.Expression): Expr {
    if (ts.isParenthesizedExpression(n)) {
      return parseExpr(n.expression);
    } else if (ts.isNumericLiteral(n)) {
      return parseNumber(n.getText(sf));
    } else if (ts.isBigIntLiteral(n)) {
      return int(BigInt(n.getText(sf).replace(/_/g, "").slice(0, -1)));
    } else if (ts.isIdentifier(n)) {
      switch (n.text) {
        case "NaN":
          return float(NaN);
        case "Infinity":
          return float(Infinity);
        default:
          return varRef(n.text);
      }
    } else if (ts.isTypeAssertionExpression(n) || ts.isAsExpression(n)) {
      return cast(parseType(n.type), parseExpr(n.expression));
    } else if (ts.isPrefixUnaryExpression(n)) {
      const operand = parseExpr(n.operand);
      switch (n.operator) {
        case ts.SyntaxKind.MinusToken:
          return negExpr(operand);
        case ts.SyntaxKind.PlusToken:
          return plusExpr(operand);
        case ts.SyntaxKind.ExclamationToken:
          return notExpr(operand);
        default:
          return fail(n, `Unsupported unary operator: ${ts.tokenToString(n.operator) ?? n.operator}`);
      }
    } else if (ts.isBinaryExpression(n)) {
      return {
        tag: "binop",
        op: parseBinaryOp(n.operatorToken),
        left: parseExpr(n.left),
        right: parseExpr(n.right),
      };
    } else if (ts.isCallExpression(n)) {
      if (!ts.isIdentifier(n.expression) || n.expression.text !== "reinterpret") {
        return fail(n, `Unsupported call: ${n.expression.getText(sf)}`);
      }
      const typeArgs = n.typeArguments ?? [];
      if (typeArgs.length !== 1 || n.arguments.length !== 1) {
        return fail(n, "reinterpret takes one type argument and one argument");
      }
      return reinterpretExpr(parseNumericType(typeArgs[0]), parseExpr(n.arguments[0]));
    } else if (ts.isPropertyAccessExpression(n)) {
      const owner = n.expression;
      if (!ts.isIdentifier(owner) || !isNumericType(owner.text)) {
        return fail(n, `Unsupported property access: ${n.getText(sf)}`);
      }
      return constantExpr(owner.text, n.name.text);
    }

    switch (n.kind) {
      case ts.SyntaxKind.TrueKeyword:
        return bool(true);
      case ts.SyntaxKind.FalseKeyword:
        return bool(false);
      default:
        return fail(n, `Unsupported expression: ${ts.SyntaxKind[n.kind]}`);
    }
  }

  function parseAssert(call: ts.CallExpression): Stmt {
    const [cond, message, ...rest] = call.arguments;
    if (!cond || rest.length > 0) {
      return fail(call, "assert takes a condition and an optional message");
    }
    let text: string | undefined;
    if (message) {
      if (!ts.isStringLiteralLike(message)) {
        return fail(message, "assert message must be a string literal");
      }
      text = message.text;
    }
    return {
      tag: "assert",
      cond: parseExpr(cond),
      message: text,
      line: position(call).line + 1,
      source: cond.getText(sf),
    };
  }

  function parseDeclaration(decl: ts.VariableDeclaration): Stmt {
    if (!ts.isIdentifier(decl.name)) {
      return fail(decl.name, "Destructuring is not supported");
    }
    if (!decl.initializer) {
      return fail(decl, `Variable ${decl.name.text} has no initializer`);
    }
    return {
      tag: "var",
      name: decl.name.text,
      declaredType: decl.type ? parseType(decl.type) : undefined,
      init: parseExpr(decl.initializer),
      line: position(decl).line + 1,
    };
  }

  const statements: Stmt[] = [];
  for (const statement of sf.statements) {
    if (ts.isVariableStatement(statement)) {
      statements.push(...statement.declarationList.declarations.map(parseDeclaration));
    } else if (
      ts.isExpressionStatement(statement) &&
      ts.isCallExpression(statement.expression) &&
      ts.isIdentifier(statement.expression.expression) &&
      statement.expression.expression.text === "assert"
    ) {
      statements.push(parseAssert(statement.expression));
    } else if (!ts.isEmptyStatement(statement)) {
      fail(statement, "Only variable declarations and assert() calls are allowed at the top level");
    }
  }
  return { statements };
}
