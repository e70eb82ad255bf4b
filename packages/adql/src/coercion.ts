/**
 * Type families and coercion rules used by the annotator and the function
 * registry. NULL is polymorphic: it is accepted wherever any type is.
 */

import type { AdqlType, Literal, ParamType } from "./types.ts";

const NUMERIC_RANK: Partial<Record<AdqlType, number>> = {
  smallint: 1,
  integer: 2,
  bigint: 3,
  real: 4,
  double: 5,
};

const STRING_TYPES: ReadonlySet<AdqlType> = new Set(["char", "varchar", "unicodeChar", "clob"]);
const GEOMETRY_TYPES: ReadonlySet<AdqlType> = new Set(["point", "circle", "polygon", "region"]);

const MAX_INTEGER = 2147483647;

export function isNumeric(type: AdqlType): boolean {
  return NUMERIC_RANK[type] !== undefined;
}

export function isString(type: AdqlType): boolean {
  return STRING_TYPES.has(type);
}

export function isGeometry(type: AdqlType): boolean {
  return GEOMETRY_TYPES.has(type);
}

/** The wider of two numeric types; NULL yields the other side. */
export function widenNumeric(a: AdqlType, b: AdqlType): AdqlType {
  if (a === "null") return b;
  if (b === "null") return a;
  return (NUMERIC_RANK[a] ?? 0) >= (NUMERIC_RANK[b] ?? 0) ? a : b;
}

export function acceptsParam(param: ParamType, arg: AdqlType): boolean {
  if (arg === "null" || param === "any") return true;
  switch (param) {
    case "numeric":
      return isNumeric(arg);
    case "string":
      return isString(arg);
    case "geometry":
      return isGeometry(arg);
    case "region":
      return isGeometry(arg);
    case "double":
    case "real":
    case "bigint":
    case "integer":
    case "smallint":
      return isNumeric(arg) && (NUMERIC_RANK[arg] ?? 0) <= (NUMERIC_RANK[param] ?? 0);
    default:
      if (isString(param)) return isString(arg);
      return param === arg;
  }
}

export function comparable(a: AdqlType, b: AdqlType): boolean {
  if (a === "null" || b === "null") return true;
  if (isNumeric(a)) return isNumeric(b);
  if (isString(a)) return isString(b) || b === "timestamp";
  if (a === "timestamp") return b === "timestamp" || isString(b);
  if (a === "boolean") return b === "boolean";
  return false;
}

export function literalType(literal: Literal): AdqlType {
  switch (literal.kind) {
    case "integer":
      return literal.value > MAX_INTEGER ? "bigint" : "integer";
    case "bigint":
      return "bigint";
    case "double":
      return "double";
    case "string":
      return "varchar";
    case "boolean":
      return "boolean";
    case "null":
      return "null";
  }
}
