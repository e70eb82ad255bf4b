/**
 * Generic traversal over expression nodes. Subqueries are not entered: each
 * stage handles query expressions with their own scope.
 */

import type { Expression } from "./types.ts";

export function expressionChildren(expr: Expression): Expression[] {
  switch (expr.type) {
    case "ColumnRef":
    case "Literal":
    case "Exists":
    case "SqlRaw":
      return [];
    case "FunctionCall":
    case "SqlCall":
    case "SqlTemplate":
    case "GeometryLiteral":
      return expr.args;
    case "BinaryExpr":
    case "Comparison":
      return [expr.left, expr.right];
    case "UnaryExpr":
    case "NullCheck":
      return [expr.operand];
    case "Between":
      return [expr.operand, expr.low, expr.high];
    case "InList":
      return [expr.operand, ...expr.values];
    case "LikePattern":
      return [expr.operand, expr.pattern];
  }
}

/** A copy of `expr` with every direct child replaced by `fn(child)`. */
export function mapChildren(expr: Expression, fn: (child: Expression) => Expression): Expression {
  switch (expr.type) {
    case "ColumnRef":
    case "Literal":
    case "Exists":
    case "SqlRaw":
      return expr;
    case "FunctionCall":
      return { ...expr, args: expr.args.map(fn) };
    case "SqlCall":
      return { ...expr, args: expr.args.map(fn) };
    case "SqlTemplate":
      return { ...expr, args: expr.args.map(fn) };
    case "GeometryLiteral":
      return { ...expr, args: expr.args.map(fn) };
    case "BinaryExpr":
      return { ...expr, left: fn(expr.left), right: fn(expr.right) };
    case "Comparison":
      return { ...expr, left: fn(expr.left), right: fn(expr.right) };
    case "UnaryExpr":
      return { ...expr, operand: fn(expr.operand) };
    case "NullCheck":
      return { ...expr, operand: fn(expr.operand) };
    case "Between":
      return { ...expr, operand: fn(expr.operand), low: fn(expr.low), high: fn(expr.high) };
    case "InList":
      return { ...expr, operand: fn(expr.operand), values: expr.values.map(fn) };
    case "LikePattern":
      return { ...expr, operand: fn(expr.operand), pattern: fn(expr.pattern) };
  }
}
