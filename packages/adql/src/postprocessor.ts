/**
 * Postprocessor
 *
 * Backend-independent rewrites of annotated expressions. Every function
 * returns a new tree; subqueries are left to the caller.
 */

import { mapChildren } from "./ast.ts";
import { literalType } from "./coercion.ts";
import type { BinaryExpr, Comparison, ComparisonOperator, Expression, FieldInfo, Literal } from "./types.ts";

// ============================================================================
// Constant Folding
// ============================================================================

type NumericLiteral = Literal & { kind: "integer" | "double" };

function isNumericLiteral(expr: Expression): expr is NumericLiteral {
  return expr.type === "Literal" && (expr.kind === "integer" || expr.kind === "double");
}

function integerLiteral(value: number, template: Expression): Literal {
  const literal: Literal = { type: "Literal", kind: "integer", value, raw: String(value), location: template.location };
  const info: FieldInfo = { type: literalType(literal), unit: template.info?.unit ?? "", ucd: template.info?.ucd ?? "" };
  return { ...literal, info };
}

function booleanLiteral(value: boolean, template: Expression): Literal {
  return {
    type: "Literal",
    kind: "boolean",
    value,
    raw: value ? "TRUE" : "FALSE",
    location: template.location,
    info: { type: "boolean", unit: "", ucd: "" },
  };
}

function foldIntegers(expr: BinaryExpr, left: number, right: number): number | undefined {
  switch (expr.op) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      return right === 0 ? undefined : Math.trunc(left / right);
    default:
      return undefined;
  }
}

function compareNumbers(op: ComparisonOperator, left: number, right: number): boolean {
  switch (op) {
    case "=":
      return left === right;
    case "<>":
      return left !== right;
    case "<":
      return left < right;
    case "<=":
      return left <= right;
    case ">":
      return left > right;
    case ">=":
      return left >= right;
  }
}

function foldNode(expr: Expression): Expression {
  switch (expr.type) {
    case "UnaryExpr": {
      const operand = expr.operand;
      if (expr.op === "NOT" || !isNumericLiteral(operand)) return expr;
      if (expr.op === "+") return operand;
      const raw = operand.raw.startsWith("-") ? operand.raw.slice(1) : `-${operand.raw}`;
      return { ...operand, value: -operand.value, raw, location: expr.location, info: expr.info ?? operand.info };
    }

    case "BinaryExpr": {
      const { left, right } = expr;
      if (expr.op === "||" && left.type === "Literal" && left.kind === "string") {
        if (right.type !== "Literal" || right.kind !== "string") return expr;
        const value = left.value + right.value;
        return {
          ...left,
          value,
          raw: `'${value.replace(/'/g, "''")}'`,
          location: expr.location,
          info: { type: "varchar", unit: "", ucd: "" },
        };
      }
      if (!isNumericLiteral(left) || !isNumericLiteral(right)) return expr;
      if (left.kind !== "integer" || right.kind !== "integer") return expr;
      const value = foldIntegers(expr, left.value, right.value);
      if (value === undefined || !Number.isSafeInteger(value)) return expr;
      return integerLiteral(value, expr);
    }

    case "Comparison": {
      const { left, right } = expr;
      if (!isNumericLiteral(left) || !isNumericLiteral(right)) return expr;
      return booleanLiteral(compareNumbers(expr.op, left.value, right.value), expr);
    }

    default:
      return expr;
  }
}

/** Fold literal arithmetic and literal comparisons, bottom-up. */
export function foldConstants(expr: Expression): Expression {
  return foldNode(mapChildren(expr, foldConstants));
}

const FUNCTIONS: Readonly<Record<string, (args: number[]) => number | undefined>> = {
  ABS: ([x]) => (x === undefined ? undefined : Math.abs(x)),
  COS: ([x]) => (x === undefined ? undefined : Math.cos(x)),
  DEGREES: ([x]) => (x === undefined ? undefined : (x * 180) / Math.PI),
  PI: () => Math.PI,
  POWER: ([x, y]) => (x === undefined || y === undefined ? undefined : x ** y),
  RADIANS: ([x]) => (x === undefined ? undefined : (x * Math.PI) / 180),
  SIN: ([x]) => (x === undefined ? undefined : Math.sin(x)),
  SQRT: ([x]) => (x === undefined || x < 0 ? undefined : Math.sqrt(x)),
  TAN: ([x]) => (x === undefined ? undefined : Math.tan(x)),
};

/**
 * Evaluate a constant numeric expression in double precision, or return
 * undefined when it depends on data or cannot be evaluated.
 */
export function evaluateNumeric(expr: Expression): number | undefined {
  let value: number | undefined;
  switch (expr.type) {
    case "Literal":
      value = isNumericLiteral(expr) ? expr.value : undefined;
      break;
    case "UnaryExpr": {
      if (expr.op === "NOT") return undefined;
      const operand = evaluateNumeric(expr.operand);
      value = operand === undefined ? undefined : expr.op === "-" ? -operand : operand;
      break;
    }
    case "BinaryExpr": {
      const left = evaluateNumeric(expr.left);
      const right = evaluateNumeric(expr.right);
      if (left === undefined || right === undefined) return undefined;
      if (expr.op === "+") value = left + right;
      else if (expr.op === "-") value = left - right;
      else if (expr.op === "*") value = left * right;
      else if (expr.op === "/") value = right === 0 ? undefined : left / right;
      break;
    }
    case "FunctionCall": {
      const fn = FUNCTIONS[expr.name.toUpperCase()];
      const args = expr.args.map(evaluateNumeric);
      if (!fn || args.some((arg) => arg === undefined)) return undefined;
      value = fn(args.filter((arg): arg is number => arg !== undefined));
      break;
    }
    default:
      return undefined;
  }
  return value !== undefined && Number.isFinite(value) ? value : undefined;
}

// ============================================================================
// Predicate Simplification
// ============================================================================

const INVERSE: Record<ComparisonOperator, ComparisonOperator> = {
  "=": "<>",
  "<>": "=",
  "<": ">=",
  "<=": ">",
  ">": "<=",
  ">=": "<",
};

/** The negation of `expr` pushed one level down, where a node can absorb it. */
export function negate(expr: Expression): Expression | undefined {
  switch (expr.type) {
    case "UnaryExpr":
      return expr.op === "NOT" ? expr.operand : undefined;
    case "Comparison": {
      const inverted: Comparison = { ...expr, op: INVERSE[expr.op] };
      return inverted;
    }
    case "NullCheck":
      return { ...expr, negated: !expr.negated };
    case "Between":
      return { ...expr, negated: !expr.negated };
    case "InList":
      return { ...expr, negated: !expr.negated };
    case "LikePattern":
      return { ...expr, negated: !expr.negated };
    case "Literal":
      return expr.kind === "boolean" ? booleanLiteral(!expr.value, expr) : undefined;
    default:
      return undefined;
  }
}

function isBoolean(expr: Expression, value: boolean): boolean {
  return expr.type === "Literal" && expr.kind === "boolean" && expr.value === value;
}

function simplifyNode(expr: Expression): Expression {
  if (expr.type === "UnaryExpr" && expr.op === "NOT") {
    return negate(expr.operand) ?? expr;
  }
  if (expr.type === "BinaryExpr" && expr.op === "AND") {
    if (isBoolean(expr.left, false) || isBoolean(expr.right, false)) return booleanLiteral(false, expr);
    if (isBoolean(expr.left, true)) return expr.right;
    if (isBoolean(expr.right, true)) return expr.left;
  }
  if (expr.type === "BinaryExpr" && expr.op === "OR") {
    if (isBoolean(expr.left, true) || isBoolean(expr.right, true)) return booleanLiteral(true, expr);
    if (isBoolean(expr.left, false)) return expr.right;
    if (isBoolean(expr.right, false)) return expr.left;
  }
  return expr;
}

/**
 * Remove double negation, push NOT into predicates that carry their own
 * negation, and drop boolean literals from AND/OR.
 */
export function simplifyPredicates(expr: Expression): Expression {
  return simplifyNode(mapChildren(expr, simplifyPredicates));
}

/** Constant folding followed by predicate simplification. */
export function postprocess(expr: Expression): Expression {
  return simplifyPredicates(foldConstants(expr));
}
