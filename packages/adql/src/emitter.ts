/**
 * SQL Emitter
 *
 * Renders a morphed tree as one line of PostgreSQL. Numbers and strings
 * become bound parameters, numbered in the order they appear in the text;
 * everything else is inline.
 */

import { literalType } from "./coercion.ts";
import { InternalMorphError } from "./errors.ts";
import { renderIdentifier } from "./identifiers.ts";
import type {
  AdqlType,
  BinaryOperator,
  BoundParameter,
  Expression,
  FromItem,
  Literal,
  OrderItem,
  Query,
  QueryExpression,
  SelectEntry,
} from "./types.ts";

export type PlaceholderStyle = "positional" | "named";

export interface EmitOptions {
  /** `$1` (default) or `:p1` */
  placeholder?: PlaceholderStyle;
}

export interface EmittedSql {
  sql: string;
  parameters: BoundParameter[];
}

// ============================================================================
// Emitter Context
// ============================================================================

interface EmitterContext {
  placeholder: PlaceholderStyle;

  /** Parameters in the order their placeholders were written */
  parameters: BoundParameter[];
}

function bind(value: string | number | bigint, type: AdqlType, ctx: EmitterContext): string {
  const index = ctx.parameters.length + 1;
  ctx.parameters.push({ index, value, type });
  return ctx.placeholder === "named" ? `:p${index}` : `$${index}`;
}

// ============================================================================
// Precedence
// ============================================================================

const PRIMARY = 9;

function binaryPrecedence(op: BinaryOperator): number {
  switch (op) {
    case "OR":
      return 1;
    case "AND":
      return 2;
    case "||":
      return 5;
    case "+":
    case "-":
      return 6;
    case "*":
    case "/":
      return 7;
  }
}

function precedence(expr: Expression): number {
  switch (expr.type) {
    case "BinaryExpr":
      return binaryPrecedence(expr.op);
    case "UnaryExpr":
      return expr.op === "NOT" ? 3 : 8;
    case "Comparison":
    case "Between":
    case "InList":
    case "LikePattern":
    case "NullCheck":
      return 4;
    default:
      return PRIMARY;
  }
}

/** `expr`, parenthesized when it binds looser than `min`. */
function operand(expr: Expression, min: number, ctx: EmitterContext): string {
  const sql = emitExpression(expr, ctx);
  return precedence(expr) < min ? `(${sql})` : sql;
}

// ============================================================================
// Expressions
// ============================================================================

function emitLiteral(literal: Literal, ctx: EmitterContext): string {
  const type = literal.info?.type ?? literalType(literal);
  switch (literal.kind) {
    case "integer":
    case "bigint":
    case "double":
      return bind(literal.value, type, ctx);
    case "string":
      return bind(literal.value, type, ctx);
    case "boolean":
      return literal.value ? "TRUE" : "FALSE";
    case "null":
      return "NULL";
  }
}

function emitTemplate(text: string, args: readonly Expression[], ctx: EmitterContext): string {
  return text.replace(/\{(\d+)\}/g, (_match, index: string) => {
    const arg = args[Number(index)];
    if (!arg) {
      throw new InternalMorphError(`Template ${text} has no argument ${index}`);
    }
    return operand(arg, PRIMARY, ctx);
  });
}

function not(negated: boolean): string {
  return negated ? "NOT " : "";
}

function emitExpression(expr: Expression, ctx: EmitterContext): string {
  switch (expr.type) {
    case "ColumnRef": {
      const parts = [...(expr.qualifier ?? []), expr.name];
      return parts.map(renderIdentifier).join(".");
    }

    case "Literal":
      return emitLiteral(expr, ctx);

    case "BinaryExpr": {
      const p = precedence(expr);
      const associative = expr.op === "AND" || expr.op === "OR";
      return `${operand(expr.left, p, ctx)} ${expr.op} ${operand(expr.right, associative ? p : p + 1, ctx)}`;
    }

    case "UnaryExpr": {
      if (expr.op === "NOT") return `NOT ${operand(expr.operand, 3, ctx)}`;
      const inner = operand(expr.operand, 8, ctx);
      return inner.startsWith("-") || inner.startsWith("+") ? `${expr.op}(${inner})` : `${expr.op}${inner}`;
    }

    case "Comparison":
      return `${operand(expr.left, 5, ctx)} ${expr.op} ${operand(expr.right, 5, ctx)}`;

    case "Between":
      return `${operand(expr.operand, 5, ctx)} ${not(expr.negated)}BETWEEN ${operand(expr.low, 5, ctx)} AND ${operand(
        expr.high,
        5,
        ctx
      )}`;

    case "InList": {
      const left = operand(expr.operand, 5, ctx);
      const list = expr.subquery
        ? emitQueryExpression(expr.subquery, ctx)
        : expr.values.map((value) => emitExpression(value, ctx)).join(", ");
      return `${left} ${not(expr.negated)}IN (${list})`;
    }

    case "LikePattern":
      return `${operand(expr.operand, 5, ctx)} ${not(expr.negated)}${expr.caseInsensitive ? "ILIKE" : "LIKE"} ${operand(
        expr.pattern,
        5,
        ctx
      )}`;

    case "NullCheck":
      return `${operand(expr.operand, 5, ctx)} IS ${not(expr.negated)}NULL`;

    case "Exists":
      return `EXISTS (${emitQueryExpression(expr.subquery, ctx)})`;

    case "SqlCall": {
      const quantifier = expr.quantifier ? `${expr.quantifier} ` : "";
      const args = expr.star ? "*" : expr.args.map((arg) => emitExpression(arg, ctx)).join(", ");
      return `${expr.name}(${quantifier}${args})`;
    }

    case "SqlTemplate":
      return emitTemplate(expr.template, expr.args, ctx);

    case "SqlRaw":
      return expr.sql;

    case "FunctionCall":
    case "GeometryLiteral":
      throw new InternalMorphError(`${expr.type} ${expr.type === "FunctionCall" ? expr.name : expr.shape} was not morphed`, {
        location: expr.location,
      });
  }
}

// ============================================================================
// Queries
// ============================================================================

function emitSelectEntry(entry: SelectEntry, ctx: EmitterContext): string {
  if (entry.type === "SelectStar") {
    throw new InternalMorphError("Select list still contains *", { location: entry.location });
  }
  const expr = emitExpression(entry.expr, ctx);
  return entry.alias ? `${expr} AS ${renderIdentifier(entry.alias)}` : expr;
}

function emitFromItem(item: FromItem, ctx: EmitterContext): string {
  switch (item.type) {
    case "TableRef": {
      const name = item.name.map(renderIdentifier).join(".");
      return item.alias ? `${name} AS ${renderIdentifier(item.alias)}` : name;
    }

    case "DerivedTable":
      return `(${emitQueryExpression(item.query, ctx)}) AS ${renderIdentifier(item.alias)}`;

    case "Join": {
      const left = emitFromItem(item.left, ctx);
      const rightSql = emitFromItem(item.right, ctx);
      const right = item.right.type === "Join" ? `(${rightSql})` : rightSql;
      if (item.kind === "CROSS") return `${left} CROSS JOIN ${right}`;

      const keyword = item.kind === "INNER" ? "JOIN" : `${item.kind} JOIN`;
      const natural = item.natural ? "NATURAL " : "";
      if (item.on) return `${left} ${natural}${keyword} ${right} ON ${emitExpression(item.on, ctx)}`;
      if (item.using) {
        return `${left} ${natural}${keyword} ${right} USING (${item.using.map(renderIdentifier).join(", ")})`;
      }
      return `${left} ${natural}${keyword} ${right}`;
    }
  }
}

function emitOrderBy(items: readonly OrderItem[], ctx: EmitterContext): string[] {
  if (items.length === 0) return [];
  const rendered = items.map((item) => `${emitExpression(item.expr, ctx)}${item.descending ? " DESC" : ""}`);
  return [`ORDER BY ${rendered.join(", ")}`];
}

function emitLimits(top: number | undefined, offset: number | undefined, ctx: EmitterContext): string[] {
  const parts: string[] = [];
  if (top !== undefined) parts.push(`LIMIT ${bind(top, "integer", ctx)}`);
  if (offset !== undefined) parts.push(`OFFSET ${bind(offset, "integer", ctx)}`);
  return parts;
}

function emitQuery(query: Query, ctx: EmitterContext): string {
  const parts: string[] = [];

  parts.push(
    `SELECT ${query.distinct ? "DISTINCT " : ""}${query.select.items.map((e) => emitSelectEntry(e, ctx)).join(", ")}`
  );
  parts.push(`FROM ${query.from.map((item) => emitFromItem(item, ctx)).join(", ")}`);

  if (query.where) parts.push(`WHERE ${emitExpression(query.where, ctx)}`);
  if (query.groupBy.length > 0) {
    parts.push(`GROUP BY ${query.groupBy.map((expr) => emitExpression(expr, ctx)).join(", ")}`);
  }
  if (query.having) parts.push(`HAVING ${emitExpression(query.having, ctx)}`);

  parts.push(...emitOrderBy(query.orderBy, ctx));
  parts.push(...emitLimits(query.top, query.offset, ctx));
  return parts.join(" ");
}

/** A set-operation operand needs parentheses when it carries its own clauses. */
function needsParentheses(node: QueryExpression): boolean {
  if (node.type === "SetOp") return true;
  return node.top !== undefined || node.orderBy.length > 0 || node.offset !== undefined;
}

function emitQueryExpression(node: QueryExpression, ctx: EmitterContext): string {
  if (node.type === "Query") return emitQuery(node, ctx);

  const side = (operandNode: QueryExpression) => {
    const sql = emitQueryExpression(operandNode, ctx);
    return needsParentheses(operandNode) ? `(${sql})` : sql;
  };

  const parts = [`${side(node.left)} ${node.op}${node.all ? " ALL" : ""} ${side(node.right)}`];
  parts.push(...emitOrderBy(node.orderBy, ctx));
  parts.push(...emitLimits(node.top, node.offset, ctx));
  return parts.join(" ");
}

/** Render a morphed tree. Identical trees give identical text and parameters. */
export function emit(tree: QueryExpression, options: EmitOptions = {}): EmittedSql {
  const ctx: EmitterContext = { placeholder: options.placeholder ?? "positional", parameters: [] };
  const sql = emitQueryExpression(tree, ctx);
  return { sql, parameters: ctx.parameters };
}
