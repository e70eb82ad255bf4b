/**
 * ADQL Annotator
 *
 * Resolves every name in a parsed query against a catalog snapshot and
 * returns a new tree whose expressions carry type, unit, UCD and (for
 * geometries) coordinate frame, together with the output column schema.
 *
 * Scopes form a stack of levels, one per query nesting depth; each level
 * holds one frame per FROM item. Unqualified names are searched innermost
 * level first and must be unique within the level that has them.
 */

import { expressionChildren } from "./ast.ts";
import { identifierMatches, matchColumn } from "./catalog.ts";
import { comparable, isGeometry, isNumeric, isString, literalType, widenNumeric } from "./coercion.ts";
import {
  AmbiguousColumnError,
  ArityMismatchError,
  InternalMorphError,
  RecursionLimitError,
  TypeMismatchError,
  UnknownColumnError,
  UnknownTableError,
  UnsupportedFeatureError,
  UnsupportedFunctionError,
} from "./errors.ts";
import { arityMatches, type FunctionRegistry } from "./functions.ts";
import { parseStcs } from "./stcs.ts";
import type {
  AdqlType,
  BinaryOperator,
  ColumnMeta,
  ColumnRef,
  Expression,
  FieldInfo,
  FromItem,
  FunctionCall,
  FunctionSignature,
  GeometryLiteral,
  GeometryShape,
  Identifier,
  MetadataCatalog,
  OrderItem,
  OutputColumn,
  Query,
  QueryExpression,
  SelectItem,
  SelectList,
  SetOp,
  SourceLocation,
  TableMeta,
} from "./types.ts";

export const DEFAULT_MAX_DEPTH = 512;

export interface AnnotateOptions {
  /** Maximum nesting of query and expression nodes */
  maxDepth?: number;
}

export interface AnnotatedQuery {
  tree: QueryExpression;
  outputColumns: OutputColumn[];
  /** Version of the catalog snapshot the tree was resolved against */
  catalogVersion: string;
}

// ============================================================================
// Scopes
// ============================================================================

interface Frame {
  /** Qualifier the backend knows this frame by */
  range: Identifier[];
  alias?: Identifier;
  table?: TableMeta;
  columns: readonly ColumnMeta[];
  /** Lower-cased names merged into the left side of a USING or NATURAL join */
  coalesced: Set<string>;
}

type Level = Frame[];

interface Context {
  levels: Level[];
  /** Whether aggregate calls may appear here */
  aggregates: boolean;
}

type ResultColumn = OutputColumn & { frame?: string };

interface AnnotatedExpression {
  tree: QueryExpression;
  columns: ResultColumn[];
}

/** Identifiers as the backend folds them: regular ones to lower case. */
function folded(identifier: Identifier): string {
  return identifier.quoted ? identifier.name : identifier.name.toLowerCase();
}

function describeName(parts: readonly Identifier[]): string {
  return parts.map((part) => part.name).join(".");
}

function tableRange(table: TableMeta): Identifier[] {
  const quoted = table.caseSensitive ?? false;
  const name = { name: table.name, quoted };
  return table.schema ? [{ name: table.schema, quoted }, name] : [name];
}

function frameMatches(frame: Frame, qualifier: readonly Identifier[]): boolean {
  const last = qualifier[qualifier.length - 1];
  if (!last) return false;
  if (frame.alias) {
    return qualifier.length === 1 && folded(last) === folded(frame.alias);
  }
  if (!frame.table || !identifierMatches(last, frame.table.name)) return false;
  const schema = qualifier[qualifier.length - 2];
  if (!schema) return true;
  return frame.table.schema !== undefined && identifierMatches(schema, frame.table.schema);
}

function visibleColumn(frame: Frame, name: Identifier): ColumnMeta | undefined {
  const column = matchColumn(frame.columns, name);
  if (!column || frame.coalesced.has(column.name.toLowerCase())) return undefined;
  return column;
}

function toColumnMeta(column: ResultColumn): ColumnMeta {
  return {
    name: column.name,
    type: column.type,
    unit: column.unit,
    ucd: column.ucd,
    nullable: true,
    primaryKey: false,
    indexed: false,
    geometry: isGeometry(column.type),
    caseSensitive: true,
    frame: column.frame,
  };
}

// ============================================================================
// Units and Metadata
// ============================================================================

function multiplyUnits(a: string, b: string): string {
  if (!a) return b;
  if (!b) return a;
  return `${a}*${b}`;
}

function divideUnits(a: string, b: string): string {
  if (!b) return a;
  const denominator = /[*/]/.test(b) ? `(${b})` : b;
  return `${a || "1"}/${denominator}`;
}

function addUnits(a: string, b: string): string {
  if (a === b || !b) return a;
  if (!a) return b;
  return "";
}

function infoOf(expr: Expression): FieldInfo {
  if (!expr.info) {
    throw new InternalMorphError(`Expression ${expr.type} was not annotated`, { location: expr.location });
  }
  return expr.info;
}

function functionInfo(signature: FunctionSignature, args: readonly Expression[]): FieldInfo {
  const first = args[0]?.info;
  const type: AdqlType = signature.returns === "arg0" ? (first?.type ?? "null") : signature.returns;
  const rule = signature.meta;

  let unit = "";
  let ucd = "";
  if (rule === "keep") {
    unit = first?.unit ?? "";
    ucd = first?.ucd ?? "";
  } else if (rule && "ucdPrefix" in rule) {
    unit = first?.unit ?? "";
    ucd = first?.ucd ? `${rule.ucdPrefix};${first.ucd}` : rule.ucdPrefix;
  } else if (rule) {
    unit = rule.unit;
    ucd = rule.ucd;
  }

  const info: FieldInfo = { type, unit, ucd };
  if (isGeometry(type) && first?.frame !== undefined) info.frame = first.frame;
  return info;
}

function referencesColumn(expr: Expression): boolean {
  return expr.type === "ColumnRef" || expressionChildren(expr).some(referencesColumn);
}

const OPERATOR_LEVEL: Record<BinaryOperator, number> = {
  OR: 1,
  AND: 2,
  "||": 3,
  "+": 4,
  "-": 4,
  "*": 5,
  "/": 5,
};

function containsAggregate(expr: Expression): boolean {
  if (expr.type === "FunctionCall" && expr.signature?.aggregate) return true;
  return expressionChildren(expr).some(containsAggregate);
}

function isCondition(expr: Expression): boolean {
  const type = expr.info?.type;
  if (type === "boolean" || type === "null") return true;
  return expr.type === "FunctionCall" && expr.signature?.predicate === true;
}

// ============================================================================
// Canonical Keys
// ============================================================================

/**
 * A canonical text form of an annotated expression. Two expressions with the
 * same key compute the same value, which is how GROUP BY items are matched.
 */
export function expressionKey(expr: Expression): string {
  const keys = (list: readonly Expression[]) => list.map(expressionKey).join(",");
  switch (expr.type) {
    case "ColumnRef": {
      const resolved = expr.resolved;
      if (resolved?.kind === "column") {
        return `col(${resolved.level}.${resolved.frame}.${resolved.column.name})`;
      }
      if (resolved?.kind === "output") return `out(${resolved.name})`;
      return `ref(${describeName([...(expr.qualifier ?? []), expr.name])})`;
    }
    case "Literal":
      return `lit(${expr.kind}:${String(expr.value)})`;
    case "FunctionCall":
      return `fn(${expr.name.toUpperCase()}:${expr.quantifier ?? ""}:${expr.star ? "*" : keys(expr.args)})`;
    case "BinaryExpr":
    case "Comparison":
      return `(${expressionKey(expr.left)} ${expr.op} ${expressionKey(expr.right)})`;
    case "UnaryExpr":
      return `${expr.op}(${expressionKey(expr.operand)})`;
    case "Between":
      return `between(${expr.negated}:${keys([expr.operand, expr.low, expr.high])})`;
    case "InList":
      return `in(${expr.negated}:${expressionKey(expr.operand)}:${keys(expr.values)}:${
        expr.subquery?.location?.start.offset ?? ""
      })`;
    case "LikePattern":
      return `like(${expr.negated}:${expr.caseInsensitive}:${keys([expr.operand, expr.pattern])})`;
    case "NullCheck":
      return `null(${expr.negated}:${expressionKey(expr.operand)})`;
    case "Exists":
      return `exists(${expr.subquery.location?.start.offset ?? ""})`;
    case "GeometryLiteral":
      return `geom(${expr.shape}:${expr.coordSys ?? ""}:${keys(expr.args)})`;
    case "SqlCall":
      return `sql(${expr.name}:${keys(expr.args)})`;
    case "SqlTemplate":
      return `sql(${expr.template}:${keys(expr.args)})`;
    case "SqlRaw":
      return `sql(${expr.sql})`;
  }
}

// ============================================================================
// Geometry Constructors
// ============================================================================

const GEOMETRY_TYPES: Record<GeometryShape, AdqlType> = {
  POINT: "point",
  CIRCLE: "circle",
  BOX: "polygon",
  POLYGON: "polygon",
  REGION: "region",
};

function geometryArityValid(shape: GeometryShape, count: number): boolean {
  switch (shape) {
    case "POINT":
      return count === 2;
    case "CIRCLE":
      return count === 3;
    case "BOX":
      return count === 4;
    case "POLYGON":
      return count >= 6 && count % 2 === 0;
    case "REGION":
      return count === 1;
  }
}

const GEOMETRY_ARITY: Record<GeometryShape, string> = {
  POINT: "2 coordinates",
  CIRCLE: "3 values (x, y, radius)",
  BOX: "4 values (x, y, width, height)",
  POLYGON: "an even number of at least 6 coordinates",
  REGION: "1 STC-S string",
};

// ============================================================================
// Annotator
// ============================================================================

class Annotator {
  private depth = 0;

  constructor(
    private readonly catalog: MetadataCatalog,
    private readonly functions: FunctionRegistry,
    private readonly maxDepth: number
  ) {}

  private enter<T>(location: SourceLocation | undefined, fn: () => T): T {
    this.depth++;
    try {
      if (this.depth > this.maxDepth) {
        throw new RecursionLimitError(`Query is nested deeper than ${this.maxDepth} levels`, { location });
      }
      return fn();
    } finally {
      this.depth--;
    }
  }

  // ==========================================================================
  // Query expressions
  // ==========================================================================

  queryExpression(node: QueryExpression, outer: Level[]): AnnotatedExpression {
    return this.enter(node.location, () =>
      node.type === "SetOp" ? this.setOp(node, outer) : this.query(node, outer)
    );
  }

  private setOp(node: SetOp, outer: Level[]): AnnotatedExpression {
    const left = this.queryExpression(node.left, outer);
    const right = this.queryExpression(node.right, outer);

    if (left.columns.length !== right.columns.length) {
      throw new TypeMismatchError(
        `${node.op} operands return ${left.columns.length} and ${right.columns.length} columns`,
        { location: node.location }
      );
    }
    left.columns.forEach((column, index) => {
      const other = right.columns[index];
      if (other && !comparable(column.type, other.type)) {
        throw new TypeMismatchError(
          `${node.op} column ${index + 1} combines ${column.type} with ${other.type}`,
          { location: node.location }
        );
      }
    });

    const orderBy = node.orderBy.map((item) => this.setOrderItem(item, left.columns));
    return { tree: { ...node, left: left.tree, right: right.tree, orderBy }, columns: left.columns };
  }

  private setOrderItem(item: OrderItem, columns: readonly ResultColumn[]): OrderItem {
    const expr = item.expr;
    if (expr.type === "Literal" && (expr.kind === "integer" || expr.kind === "bigint")) {
      return { ...item, expr: this.orderPosition(expr.value, columns, expr) };
    }
    if (expr.type === "ColumnRef" && !expr.qualifier) {
      const matches = columns.filter((column) => identifierMatches(expr.name, column.name));
      const [match] = matches;
      if (matches.length > 1) {
        throw new AmbiguousColumnError(`Output column ${expr.name.name} is ambiguous`, {
          location: expr.location,
          token: expr.name.name,
        });
      }
      if (match) {
        return {
          ...item,
          expr: { ...expr, resolved: { kind: "output", name: match.name }, info: this.columnInfo(match) },
        };
      }
      throw new UnknownColumnError(`Unknown output column ${expr.name.name}`, {
        location: expr.location,
        token: expr.name.name,
      });
    }
    throw new UnsupportedFeatureError("ORDER BY of a set operation must name an output column or position", {
      location: expr.location,
    });
  }

  private orderPosition(position: number | bigint, columns: readonly ResultColumn[], expr: Expression): Expression {
    const column = typeof position === "number" && position >= 1 ? columns[position - 1] : undefined;
    if (!column) {
      throw new UnknownColumnError(`ORDER BY position ${position} is not in the select list`, {
        location: expr.location,
        token: String(position),
      });
    }
    return { ...expr, info: this.columnInfo(column) };
  }

  private columnInfo(column: ResultColumn): FieldInfo {
    const info: FieldInfo = { type: column.type, unit: column.unit, ucd: column.ucd };
    if (column.frame !== undefined) info.frame = column.frame;
    return info;
  }

  private query(node: Query, outer: Level[]): AnnotatedExpression {
    const level = outer.length;
    const from = node.from.map((item) => this.fromItem(item, outer));
    const frames = from.flatMap((item) => item.frames);
    const levels = [...outer, frames];

    const items = this.selectItems(node.select, levels);
    const select: SelectList = { ...node.select, items };
    const columns: ResultColumn[] = items.map((item) => {
      const info = infoOf(item.expr);
      const column: ResultColumn = { name: item.outputName ?? "", type: info.type, unit: info.unit, ucd: info.ucd };
      if (info.frame !== undefined) column.frame = info.frame;
      return column;
    });

    const result: Query = { ...node, select, from: from.map((item) => item.item) };

    if (node.where) {
      result.where = this.condition(node.where, { levels, aggregates: false }, "WHERE");
    }

    result.groupBy = node.groupBy.map((expr) => this.groupItem(expr, items, levels));

    if (node.having) {
      result.having = this.condition(node.having, { levels, aggregates: true }, "HAVING");
    }

    const grouped =
      result.groupBy.length > 0 ||
      items.some((item) => containsAggregate(item.expr)) ||
      (result.having !== undefined && containsAggregate(result.having));
    if (grouped) {
      this.checkGrouping(result, items, level);
    }

    result.orderBy = node.orderBy.map((item) => this.orderItem(item, items, columns, levels));
    return { tree: result, columns };
  }

  // ==========================================================================
  // FROM clause
  // ==========================================================================

  private fromItem(item: FromItem, outer: Level[]): { item: FromItem; frames: Frame[] } {
    switch (item.type) {
      case "TableRef": {
        const table = this.catalog.lookupTable(item.name);
        if (!table) {
          throw new UnknownTableError(`Unknown table ${describeName(item.name)}`, {
            location: item.location,
            token: describeName(item.name),
          });
        }
        const frame: Frame = {
          range: item.alias ? [item.alias] : tableRange(table),
          table,
          columns: table.columns,
          coalesced: new Set(),
        };
        if (item.alias) frame.alias = item.alias;
        return { item: { ...item, table }, frames: [frame] };
      }

      case "DerivedTable": {
        const sub = this.queryExpression(item.query, outer);
        const frame: Frame = {
          range: [item.alias],
          alias: item.alias,
          columns: sub.columns.map(toColumnMeta),
          coalesced: new Set(),
        };
        return { item: { ...item, query: sub.tree }, frames: [frame] };
      }

      case "Join": {
        const left = this.fromItem(item.left, outer);
        const right = this.fromItem(item.right, outer);
        const frames = [...left.frames, ...right.frames];
        const result = { ...item, left: left.item, right: right.item };

        const shared = item.natural
          ? this.commonColumns(left.frames, right.frames)
          : (item.using ?? []);
        shared.forEach((name) => this.coalesce(name, left.frames, right.frames, item.location));

        if (item.on) {
          result.on = this.condition(item.on, { levels: [...outer, frames], aggregates: false }, "ON");
        }
        if (item.natural) {
          result.using = shared;
        }
        return { item: result, frames };
      }
    }
  }

  private commonColumns(left: readonly Frame[], right: readonly Frame[]): Identifier[] {
    const leftNames = new Set(
      left.flatMap((frame) =>
        frame.columns.filter((c) => !frame.coalesced.has(c.name.toLowerCase())).map((c) => c.name.toLowerCase())
      )
    );
    const seen = new Set<string>();
    const shared: Identifier[] = [];
    for (const frame of right) {
      for (const column of frame.columns) {
        const key = column.name.toLowerCase();
        if (leftNames.has(key) && !frame.coalesced.has(key) && !seen.has(key)) {
          seen.add(key);
          shared.push({ name: column.name, quoted: column.caseSensitive ?? false });
        }
      }
    }
    return shared;
  }

  private coalesce(
    name: Identifier,
    left: readonly Frame[],
    right: readonly Frame[],
    location: SourceLocation | undefined
  ): void {
    const find = (frames: readonly Frame[]) =>
      frames.flatMap((frame) => {
        const column = visibleColumn(frame, name);
        return column ? [{ frame, column }] : [];
      });

    const leftMatches = find(left);
    const rightMatches = find(right);
    const [leftMatch] = leftMatches;
    const [rightMatch] = rightMatches;
    if (!leftMatch || !rightMatch) {
      throw new UnknownColumnError(`Join column ${name.name} is missing on one side`, {
        location,
        token: name.name,
      });
    }
    if (leftMatches.length > 1 || rightMatches.length > 1) {
      throw new AmbiguousColumnError(`Join column ${name.name} is ambiguous`, { location, token: name.name });
    }
    if (!comparable(leftMatch.column.type, rightMatch.column.type)) {
      throw new TypeMismatchError(
        `Join column ${name.name} compares ${leftMatch.column.type} with ${rightMatch.column.type}`,
        { location }
      );
    }
    rightMatch.frame.coalesced.add(rightMatch.column.name.toLowerCase());
  }

  // ==========================================================================
  // Select list
  // ==========================================================================

  private selectItems(list: SelectList, levels: Level[]): SelectItem[] {
    const frames = levels[levels.length - 1] ?? [];
    const context: Context = { levels, aggregates: true };

    const items = list.items.flatMap((entry): SelectItem[] => {
      if (entry.type === "SelectItem") {
        return [{ ...entry, expr: this.expression(entry.expr, context) }];
      }

      if (!entry.qualifier) {
        const qualify = frames.length > 1;
        return frames.flatMap((frame, index) =>
          frame.columns
            .filter((column) => !frame.coalesced.has(column.name.toLowerCase()))
            .map((column) => this.starItem(frame, index, column, levels.length - 1, qualify, entry.location))
        );
      }

      const qualifier = entry.qualifier;
      const index = frames.findIndex((frame) => frameMatches(frame, qualifier));
      const frame = frames[index];
      if (!frame) {
        throw new UnknownTableError(`Unknown table ${describeName(qualifier)}`, {
          location: entry.location,
          token: describeName(qualifier),
        });
      }
      return frame.columns.map((column) =>
        this.starItem(frame, index, column, levels.length - 1, true, entry.location)
      );
    });

    const used = new Set<string>();
    return items.map((item, index) => {
      let name = item.alias?.name ?? this.columnName(item.expr) ?? `expr_${index + 1}`;
      while (used.has(name.toLowerCase())) {
        name = `${name}_${index + 1}`;
      }
      used.add(name.toLowerCase());
      return { ...item, outputName: name };
    });
  }

  private columnName(expr: Expression): string | undefined {
    if (expr.type === "ColumnRef" && expr.resolved?.kind === "column") {
      return expr.resolved.column.name;
    }
    return undefined;
  }

  private starItem(
    frame: Frame,
    index: number,
    column: ColumnMeta,
    level: number,
    qualify: boolean,
    location: SourceLocation | undefined
  ): SelectItem {
    const ref: ColumnRef = { type: "ColumnRef", name: { name: column.name, quoted: true }, location };
    if (qualify) ref.qualifier = frame.range;
    return { type: "SelectItem", expr: this.bind(ref, frame, index, column, level), location };
  }

  // ==========================================================================
  // Grouping and ordering
  // ==========================================================================

  private aliasMatch(name: Identifier, items: readonly SelectItem[]): SelectItem | undefined {
    const matches = items.filter((item) => item.alias && folded(item.alias) === folded(name));
    if (matches.length > 1) {
      throw new AmbiguousColumnError(`Select alias ${name.name} is ambiguous`, { token: name.name });
    }
    return matches[0];
  }

  private outputRef(ref: ColumnRef, item: SelectItem): ColumnRef {
    return {
      ...ref,
      resolved: { kind: "output", name: item.outputName ?? "" },
      info: infoOf(item.expr),
    };
  }

  private groupItem(expr: Expression, items: readonly SelectItem[], levels: Level[]): Expression {
    if (expr.type === "ColumnRef" && !expr.qualifier && !this.lookupUnqualified(expr, levels)) {
      const item = this.aliasMatch(expr.name, items);
      if (item) {
        if (containsAggregate(item.expr)) {
          throw new TypeMismatchError(`GROUP BY cannot use the aggregate ${expr.name.name}`, {
            location: expr.location,
            token: expr.name.name,
          });
        }
        return this.outputRef(expr, item);
      }
    }
    // Backend reads a constant here as a select-list position
    if (!referencesColumn(expr)) {
      throw new UnsupportedFeatureError("GROUP BY needs a column or an expression over columns", {
        location: expr.location,
        token: expr.type === "Literal" ? expr.raw : undefined,
      });
    }
    return this.expression(expr, { levels, aggregates: false });
  }

  private orderItem(
    item: OrderItem,
    items: readonly SelectItem[],
    columns: readonly ResultColumn[],
    levels: Level[]
  ): OrderItem {
    const expr = item.expr;
    if (expr.type === "Literal" && (expr.kind === "integer" || expr.kind === "bigint")) {
      return { ...item, expr: this.orderPosition(expr.value, columns, expr) };
    }
    if (expr.type === "ColumnRef" && !expr.qualifier) {
      const match = this.aliasMatch(expr.name, items);
      if (match) return { ...item, expr: this.outputRef(expr, match) };
    }
    return { ...item, expr: this.expression(expr, { levels, aggregates: true }) };
  }

  private checkGrouping(query: Query, items: readonly SelectItem[], level: number): void {
    const keys = new Set(
      query.groupBy.map((expr) => {
        if (expr.type === "ColumnRef" && expr.resolved?.kind === "output") {
          const name = expr.resolved.name;
          const item = items.find((candidate) => candidate.outputName === name);
          return item ? expressionKey(item.expr) : expressionKey(expr);
        }
        return expressionKey(expr);
      })
    );

    const ungrouped = (expr: Expression): ColumnRef | undefined => {
      if (keys.has(expressionKey(expr))) return undefined;
      switch (expr.type) {
        case "Literal":
        case "Exists":
          return undefined;
        case "ColumnRef":
          return expr.resolved?.kind === "column" && expr.resolved.level === level ? expr : undefined;
        case "FunctionCall":
          if (expr.signature?.aggregate) return undefined;
          break;
        default:
          break;
      }
      for (const child of expressionChildren(expr)) {
        const found = ungrouped(child);
        if (found) return found;
      }
      return undefined;
    };

    const checked = [...items.map((item) => item.expr), ...(query.having ? [query.having] : [])];
    for (const expr of checked) {
      const column = ungrouped(expr);
      if (column) {
        throw new TypeMismatchError(
          `Column ${column.name.name} must appear in GROUP BY or be used in an aggregate function`,
          { location: column.location, token: column.name.name }
        );
      }
    }
  }

  // ==========================================================================
  // Column resolution
  // ==========================================================================

  private bind(ref: ColumnRef, frame: Frame, index: number, column: ColumnMeta, level: number): ColumnRef {
    const info: FieldInfo = { type: column.type, unit: column.unit, ucd: column.ucd };
    if (column.frame !== undefined) info.frame = column.frame;
    return {
      ...ref,
      resolved: { kind: "column", column, table: frame.table, range: frame.range, level, frame: index },
      info,
    };
  }

  private lookupUnqualified(ref: ColumnRef, levels: Level[]): ColumnRef | undefined {
    for (let level = levels.length - 1; level >= 0; level--) {
      const frames = levels[level] ?? [];
      const matches = frames.flatMap((frame, index) => {
        const column = visibleColumn(frame, ref.name);
        return column ? [{ frame, index, column }] : [];
      });
      const [match] = matches;
      if (matches.length > 1) {
        const ranges = matches.map((m) => describeName(m.frame.range)).join(", ");
        throw new AmbiguousColumnError(`Column ${ref.name.name} is ambiguous (found in ${ranges})`, {
          location: ref.location,
          token: ref.name.name,
        });
      }
      if (match) return this.bind(ref, match.frame, match.index, match.column, level);
    }
    return undefined;
  }

  private resolveColumn(ref: ColumnRef, levels: Level[]): ColumnRef {
    const qualifier = ref.qualifier;
    if (!qualifier) {
      const resolved = this.lookupUnqualified(ref, levels);
      if (!resolved) {
        throw new UnknownColumnError(`Unknown column ${ref.name.name}`, {
          location: ref.location,
          token: ref.name.name,
        });
      }
      return resolved;
    }

    for (let level = levels.length - 1; level >= 0; level--) {
      const frames = levels[level] ?? [];
      const matches = frames.flatMap((frame, index) => (frameMatches(frame, qualifier) ? [{ frame, index }] : []));
      const [match] = matches;
      if (matches.length > 1) {
        throw new AmbiguousColumnError(`Table reference ${describeName(qualifier)} is ambiguous`, {
          location: ref.location,
          token: describeName(qualifier),
        });
      }
      if (match) {
        const column = matchColumn(match.frame.columns, ref.name);
        if (!column) {
          const name = describeName([...qualifier, ref.name]);
          throw new UnknownColumnError(`Unknown column ${name}`, { location: ref.location, token: name });
        }
        return this.bind(ref, match.frame, match.index, column, level);
      }
    }

    throw new UnknownTableError(`Unknown table ${describeName(qualifier)}`, {
      location: ref.location,
      token: describeName(qualifier),
    });
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  private condition(expr: Expression, context: Context, clause: string): Expression {
    const annotated = this.expression(expr, context);
    if (!isCondition(annotated)) {
      throw new TypeMismatchError(`${clause} needs a condition, not a ${infoOf(annotated).type} value`, {
        location: expr.location,
      });
    }
    return annotated;
  }

  private expression(expr: Expression, context: Context): Expression {
    return this.enter(expr.location, () => this.annotateExpression(expr, context));
  }

  private annotateExpression(expr: Expression, context: Context): Expression {
    switch (expr.type) {
      case "ColumnRef":
        return this.resolveColumn(expr, context.levels);

      case "Literal":
        return { ...expr, info: { type: literalType(expr), unit: "", ucd: "" } };

      case "FunctionCall":
        return this.functionCall(expr, context);

      case "GeometryLiteral":
        return this.geometry(expr, context);

      case "BinaryExpr": {
        if (expr.op === "AND" || expr.op === "OR") {
          const left = this.condition(expr.left, context, expr.op);
          const right = this.condition(expr.right, context, expr.op);
          return { ...expr, left, right, info: { type: "boolean", unit: "", ucd: "" } };
        }

        // A flat chain like a + b + c nests to the left without adding depth
        const left =
          expr.left.type === "BinaryExpr" && OPERATOR_LEVEL[expr.left.op] === OPERATOR_LEVEL[expr.op]
            ? this.annotateExpression(expr.left, context)
            : this.expression(expr.left, context);
        const right = this.expression(expr.right, context);
        const l = infoOf(left);
        const r = infoOf(right);

        if (expr.op === "||") {
          if (!(isString(l.type) || l.type === "null") || !(isString(r.type) || r.type === "null")) {
            throw new TypeMismatchError(`|| needs string operands, got ${l.type} and ${r.type}`, {
              location: expr.location,
            });
          }
          return { ...expr, left, right, info: { type: "varchar", unit: "", ucd: "" } };
        }

        if (!(isNumeric(l.type) || l.type === "null") || !(isNumeric(r.type) || r.type === "null")) {
          throw new TypeMismatchError(`${expr.op} needs numeric operands, got ${l.type} and ${r.type}`, {
            location: expr.location,
          });
        }
        const type = widenNumeric(l.type, r.type);
        let unit: string;
        let ucd: string;
        if (expr.op === "*") {
          unit = multiplyUnits(l.unit, r.unit);
          ucd = "";
        } else if (expr.op === "/") {
          unit = divideUnits(l.unit, r.unit);
          ucd = "";
        } else {
          unit = addUnits(l.unit, r.unit);
          ucd = l.ucd === r.ucd ? l.ucd : "";
        }
        return { ...expr, left, right, info: { type, unit, ucd } };
      }

      case "UnaryExpr": {
        if (expr.op === "NOT") {
          const operand = this.condition(expr.operand, context, "NOT");
          return { ...expr, operand, info: { type: "boolean", unit: "", ucd: "" } };
        }
        const operand = this.expression(expr.operand, context);
        const info = infoOf(operand);
        if (!isNumeric(info.type) && info.type !== "null") {
          throw new TypeMismatchError(`Unary ${expr.op} needs a numeric operand, got ${info.type}`, {
            location: expr.location,
          });
        }
        return { ...expr, operand, info: { type: info.type, unit: info.unit, ucd: info.ucd } };
      }

      case "Comparison": {
        const left = this.expression(expr.left, context);
        const right = this.expression(expr.right, context);
        this.requireComparable(left, right, expr.op, expr.location);
        return { ...expr, left, right, info: { type: "boolean", unit: "", ucd: "" } };
      }

      case "Between": {
        const operand = this.expression(expr.operand, context);
        const low = this.expression(expr.low, context);
        const high = this.expression(expr.high, context);
        this.requireComparable(operand, low, "BETWEEN", expr.location);
        this.requireComparable(operand, high, "BETWEEN", expr.location);
        return { ...expr, operand, low, high, info: { type: "boolean", unit: "", ucd: "" } };
      }

      case "InList": {
        const operand = this.expression(expr.operand, context);
        const values = expr.values.map((value) => {
          const annotated = this.expression(value, context);
          this.requireComparable(operand, annotated, "IN", value.location);
          return annotated;
        });
        const result = { ...expr, operand, values, info: { type: "boolean" as const, unit: "", ucd: "" } };
        if (!expr.subquery) return result;

        const sub = this.queryExpression(expr.subquery, context.levels);
        const [column] = sub.columns;
        if (!column || sub.columns.length !== 1) {
          throw new TypeMismatchError(`IN subquery must return one column, not ${sub.columns.length}`, {
            location: expr.subquery.location,
          });
        }
        const operandType = infoOf(operand).type;
        if (!comparable(operandType, column.type)) {
          throw new TypeMismatchError(`IN compares ${operandType} with ${column.type}`, {
            location: expr.location,
          });
        }
        return { ...result, subquery: sub.tree };
      }

      case "LikePattern": {
        const operand = this.expression(expr.operand, context);
        const pattern = this.expression(expr.pattern, context);
        for (const side of [operand, pattern]) {
          const type = infoOf(side).type;
          if (!isString(type) && type !== "null") {
            throw new TypeMismatchError(`${expr.caseInsensitive ? "ILIKE" : "LIKE"} needs strings, got ${type}`, {
              location: side.location ?? expr.location,
            });
          }
        }
        return { ...expr, operand, pattern, info: { type: "boolean", unit: "", ucd: "" } };
      }

      case "NullCheck": {
        const operand = this.expression(expr.operand, context);
        return { ...expr, operand, info: { type: "boolean", unit: "", ucd: "" } };
      }

      case "Exists": {
        const sub = this.queryExpression(expr.subquery, context.levels);
        return { ...expr, subquery: sub.tree, info: { type: "boolean", unit: "", ucd: "" } };
      }

      case "SqlCall":
      case "SqlTemplate":
      case "SqlRaw":
        throw new InternalMorphError(`Backend node ${expr.type} in an unannotated tree`, {
          location: expr.location,
        });
    }
  }

  private requireComparable(
    left: Expression,
    right: Expression,
    op: string,
    location: SourceLocation | undefined
  ): void {
    const l = infoOf(left).type;
    const r = infoOf(right).type;
    if (!comparable(l, r)) {
      throw new TypeMismatchError(`Cannot compare ${l} with ${r} using ${op}`, { location });
    }
  }

  private functionCall(call: FunctionCall, context: Context): FunctionCall {
    const candidates = this.functions.candidates(call.name);
    if (candidates.length === 0) {
      throw new UnsupportedFunctionError(`Unknown function ${call.name}`, {
        location: call.location,
        token: call.name,
      });
    }

    const aggregate = candidates.some((candidate) => candidate.aggregate);
    if (aggregate && !context.aggregates) {
      throw new TypeMismatchError(`Aggregate function ${call.name.toUpperCase()} is not allowed here`, {
        location: call.location,
        token: call.name,
      });
    }
    if (call.quantifier === "DISTINCT" && !aggregate) {
      throw new UnsupportedFeatureError(`DISTINCT is only allowed in aggregate functions`, {
        location: call.location,
        token: call.name,
      });
    }

    const argContext: Context = aggregate ? { ...context, aggregates: false } : context;
    const args = call.args.map((arg) => this.expression(arg, argContext));
    const arity = args.length;

    if (!candidates.some((c) => (c.star ?? false) === call.star && arityMatches(c, arity))) {
      const accepted = [...new Set(candidates.map((c) => (c.star ? "*" : String(c.params.length))))];
      throw new ArityMismatchError(
        `${call.name.toUpperCase()} takes ${accepted.join(" or ")} argument(s), got ${call.star ? "*" : arity}`,
        { location: call.location, token: call.name }
      );
    }

    const types = args.map((arg) => infoOf(arg).type);
    const signature = this.functions.lookup(call.name, types, call.star);
    if (!signature) {
      throw new TypeMismatchError(`No form of ${call.name.toUpperCase()} accepts (${types.join(", ")})`, {
        location: call.location,
        token: call.name,
      });
    }

    return { ...call, args, signature, info: functionInfo(signature, args) };
  }

  private geometry(node: GeometryLiteral, context: Context): GeometryLiteral {
    if (!geometryArityValid(node.shape, node.args.length)) {
      throw new ArityMismatchError(`${node.shape} takes ${GEOMETRY_ARITY[node.shape]}, got ${node.args.length}`, {
        location: node.location,
        token: node.shape,
      });
    }

    const args = node.args.map((arg) => this.expression(arg, context));
    const expected = node.shape === "REGION" ? "string" : "numeric";
    args.forEach((arg, index) => {
      const type = infoOf(arg).type;
      const valid = expected === "string" ? isString(type) : isNumeric(type);
      if (!valid && type !== "null") {
        throw new TypeMismatchError(`${node.shape} argument ${index + 1} must be ${expected}, got ${type}`, {
          location: arg.location ?? node.location,
        });
      }
    });

    const info: FieldInfo = { type: GEOMETRY_TYPES[node.shape], unit: "deg", ucd: "" };
    if (node.coordSys !== undefined) {
      info.frame = node.coordSys;
    } else if (node.shape === "REGION") {
      const [source] = args;
      const parsed = source?.type === "Literal" && source.kind === "string" ? parseStcs(source.value) : undefined;
      if (parsed) info.frame = parsed.frame;
    }
    return { ...node, args, info };
  }
}

/**
 * Annotate `tree` against `catalog`. The input tree is not modified; the
 * result is a fresh tree bound to this catalog snapshot.
 */
export function annotate(
  tree: QueryExpression,
  catalog: MetadataCatalog,
  functions: FunctionRegistry,
  options: AnnotateOptions = {}
): AnnotatedQuery {
  const annotator = new Annotator(catalog, functions, options.maxDepth ?? DEFAULT_MAX_DEPTH);
  const { tree: annotated, columns } = annotator.queryExpression(tree, []);
  return {
    tree: annotated,
    outputColumns: columns.map(({ name, type, unit, ucd }) => ({ name, type, unit, ucd })),
    catalogVersion: catalog.version,
  };
}
