/**
 * ADQL Morpher
 *
 * Rewrites an annotated tree into one the emitter can print for PostgreSQL
 * with pgSphere (and q3c where the catalog declares a spatial index):
 *
 * - geometry constructors become pgSphere literals or constructor calls
 * - geometry functions become pgSphere operators, with frame conversion
 * - function calls become backend calls or templates
 * - identifiers are folded and quoted the way PostgreSQL expects
 * - ORDER BY / GROUP BY references to the select list become positions
 * - the outermost row limit is capped by `maxRows`
 */

import { expressionKey } from "./annotator.ts";
import { mapChildren } from "./ast.ts";
import { CoordinateConversions, createDefaultConversions, framesCompatible, type SkyPoint } from "./coordsys.ts";
import { InternalMorphError, UnsupportedFeatureError } from "./errors.ts";
import { backendIdentifier, backendLabel } from "./identifiers.ts";
import { evaluateNumeric, postprocess } from "./postprocessor.ts";
import { parseStcs } from "./stcs.ts";
import type {
  ColumnRef,
  Comparison,
  Expression,
  FromItem,
  FunctionCall,
  GeometryLiteral,
  GeometryOperation,
  Identifier,
  Join,
  OrderItem,
  Query,
  QueryExpression,
  SelectItem,
  SourceLocation,
  SqlCall,
  SqlRaw,
  SqlTemplate,
  TableRef,
} from "./types.ts";

export interface MorphOptions {
  /** Use q3c calls for point-in-shape tests on spatially indexed columns (default true) */
  q3c?: boolean;
  /** Row cap applied to the outermost query */
  maxRows?: number;
  conversions?: CoordinateConversions;
}

// ============================================================================
// Node Builders
// ============================================================================

function raw(sql: string, location?: SourceLocation): SqlRaw {
  return { type: "SqlRaw", sql, location };
}

function call(name: string, args: Expression[], location?: SourceLocation): SqlCall {
  return { type: "SqlCall", name, args, location };
}

function template(text: string, args: Expression[], location?: SourceLocation): SqlTemplate {
  return { type: "SqlTemplate", template: text, args, location };
}

/** Shortest round-tripping text of a double. */
function formatNumber(value: number): string {
  return Object.is(value, -0) ? "0" : String(value);
}

function leftmostQuery(node: QueryExpression): Query {
  return node.type === "Query" ? node : leftmostQuery(node.left);
}

function selectItems(query: Query): SelectItem[] {
  return query.select.items.map((entry) => {
    if (entry.type === "SelectStar") {
      throw new InternalMorphError("Select list still contains *", { location: entry.location });
    }
    return entry;
  });
}

function isPredicate(expr: Expression): expr is FunctionCall {
  return expr.type === "FunctionCall" && expr.signature?.predicate === true;
}

// ============================================================================
// Literal Shapes
// ============================================================================

interface ShapeLiteral {
  shape: "POINT" | "CIRCLE" | "POLYGON";
  frame: string;
  points: SkyPoint[];
  radius?: number;
}

function pairs(values: readonly number[]): SkyPoint[] {
  const points: SkyPoint[] = [];
  for (let i = 0; i + 1 < values.length; i += 2) {
    points.push({ lon: values[i] ?? 0, lat: values[i + 1] ?? 0 });
  }
  return points;
}

function shapeFromValues(
  shape: "POINT" | "CIRCLE" | "BOX" | "POLYGON",
  frame: string,
  values: readonly number[]
): ShapeLiteral {
  const [x = 0, y = 0, a = 0, b = 0] = values;
  switch (shape) {
    case "POINT":
      return { shape, frame, points: [{ lon: x, lat: y }] };
    case "CIRCLE":
      return { shape, frame, points: [{ lon: x, lat: y }], radius: a };
    case "BOX":
      return {
        shape: "POLYGON",
        frame,
        points: [
          { lon: x - a / 2, lat: y - b / 2 },
          { lon: x - a / 2, lat: y + b / 2 },
          { lon: x + a / 2, lat: y + b / 2 },
          { lon: x + a / 2, lat: y - b / 2 },
        ],
      };
    case "POLYGON":
      return { shape, frame, points: pairs(values) };
  }
}

function spherePoint(point: SkyPoint): string {
  return `(${formatNumber(point.lon)}d,${formatNumber(point.lat)}d)`;
}

function renderShape(shape: ShapeLiteral): string {
  const [center = { lon: 0, lat: 0 }] = shape.points;
  switch (shape.shape) {
    case "POINT":
      return `'${spherePoint(center)}'::spoint`;
    case "CIRCLE":
      return `'<${spherePoint(center)},${formatNumber(shape.radius ?? 0)}d>'::scircle`;
    case "POLYGON":
      return `'{${shape.points.map(spherePoint).join(",")}}'::spoly`;
  }
}

// ============================================================================
// Morpher
// ============================================================================

class Morpher {
  private readonly q3c: boolean;
  private readonly maxRows: number | undefined;
  private readonly conversions: CoordinateConversions;

  constructor(options: MorphOptions) {
    this.q3c = options.q3c ?? true;
    this.maxRows = options.maxRows;
    this.conversions = options.conversions ?? createDefaultConversions();
  }

  // ==========================================================================
  // Query expressions
  // ==========================================================================

  queryExpression(node: QueryExpression, outermost: boolean): QueryExpression {
    if (node.type === "Query") return this.query(node, outermost);

    const columns = selectItems(leftmostQuery(node));
    const result = {
      ...node,
      left: this.queryExpression(node.left, false),
      right: this.queryExpression(node.right, false),
      orderBy: node.orderBy.map((item) => {
        const position = this.positionOf(item.expr, columns, true);
        if (position === undefined) {
          throw new InternalMorphError("Set operation ORDER BY was not resolved to an output column", {
            location: item.location,
          });
        }
        return { ...item, expr: raw(String(position), item.expr.location) };
      }),
    };
    if (outermost && this.maxRows !== undefined) {
      result.top = Math.min(node.top ?? this.maxRows, this.maxRows);
    }
    return result;
  }

  private query(node: Query, outermost: boolean): Query {
    const items = selectItems(node);
    const result: Query = {
      ...node,
      select: { ...node.select, items: items.map((item) => this.selectItem(item)) },
      from: node.from.map((item) => this.fromItem(item)),
      groupBy: node.groupBy.map((expr) => this.positionOrExpression(expr, items, false)),
      orderBy: node.orderBy.map(
        (item): OrderItem => ({ ...item, expr: this.positionOrExpression(item.expr, items, false) })
      ),
    };

    if (node.where) result.where = this.condition(postprocess(node.where));
    if (node.having) result.having = this.condition(postprocess(node.having));

    if (outermost && this.maxRows !== undefined) {
      result.top = Math.min(node.top ?? this.maxRows, this.maxRows);
    }
    return result;
  }

  /**
   * 1-based select-list position an ORDER BY or GROUP BY entry stands for:
   * an output reference, a literal position or, unless `namesOnly`, a
   * computed expression repeated from the select list.
   */
  private positionOf(expr: Expression, items: readonly SelectItem[], namesOnly: boolean): number | undefined {
    if (expr.type === "Literal" && expr.kind === "integer") return expr.value;
    if (expr.type === "ColumnRef") {
      const resolved = expr.resolved;
      if (resolved?.kind !== "output") return undefined;
      const index = items.findIndex((item) => item.outputName === resolved.name);
      return index < 0 ? undefined : index + 1;
    }
    if (namesOnly) return undefined;
    const key = expressionKey(expr);
    const index = items.findIndex((item) => expressionKey(item.expr) === key);
    return index < 0 ? undefined : index + 1;
  }

  private positionOrExpression(expr: Expression, items: readonly SelectItem[], namesOnly: boolean): Expression {
    const position = this.positionOf(expr, items, namesOnly);
    if (position !== undefined) return raw(String(position), expr.location);
    return this.expression(postprocess(expr));
  }

  private selectItem(item: SelectItem): SelectItem {
    const expr = this.expression(postprocess(item.expr));
    const outputName = item.outputName ?? "";
    const source = item.expr;

    let label: string | undefined;
    if (source.type === "ColumnRef" && source.resolved?.kind === "column") {
      const column = source.resolved.column;
      label = backendLabel(column.name, column.caseSensitive ?? false);
    }

    const result: SelectItem = { type: "SelectItem", expr, outputName, location: item.location };
    if (label !== outputName) {
      result.alias = backendIdentifier(outputName, true);
    }
    return result;
  }

  // ==========================================================================
  // FROM clause
  // ==========================================================================

  private alias(identifier: Identifier): Identifier {
    return backendIdentifier(identifier.name, identifier.quoted);
  }

  private fromItem(item: FromItem): FromItem {
    switch (item.type) {
      case "TableRef": {
        const table = item.table;
        if (!table) {
          throw new InternalMorphError(`Table ${item.name.map((n) => n.name).join(".")} was not resolved`, {
            location: item.location,
          });
        }
        const caseSensitive = table.caseSensitive ?? false;
        const name = [backendIdentifier(table.name, caseSensitive)];
        if (table.schema) name.unshift(backendIdentifier(table.schema, caseSensitive));
        const result: TableRef = { ...item, name };
        if (item.alias) result.alias = this.alias(item.alias);
        return result;
      }

      case "DerivedTable":
        return { ...item, query: this.queryExpression(item.query, false), alias: this.alias(item.alias) };

      case "Join": {
        const result: Join = {
          ...item,
          natural: false,
          left: this.fromItem(item.left),
          right: this.fromItem(item.right),
        };
        if (item.on) result.on = this.condition(postprocess(item.on));
        if (item.using) result.using = item.using.map((name) => this.alias(name));
        return result;
      }
    }
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  /** An expression in a boolean position: predicate functions stay bare. */
  private condition(expr: Expression): Expression {
    if (isPredicate(expr)) return this.predicate(expr);
    return this.expression(expr);
  }

  private expression(expr: Expression): Expression {
    switch (expr.type) {
      case "ColumnRef":
        return this.columnRef(expr);

      case "Literal":
        return expr;

      case "FunctionCall":
        if (isPredicate(expr)) {
          return template("(CASE WHEN {0} THEN 1 ELSE 0 END)", [this.predicate(expr)], expr.location);
        }
        return this.functionCall(expr);

      case "GeometryLiteral":
        return this.geometry(expr);

      case "BinaryExpr":
        if (expr.op === "AND" || expr.op === "OR") {
          return { ...expr, left: this.condition(expr.left), right: this.condition(expr.right) };
        }
        return { ...expr, left: this.expression(expr.left), right: this.expression(expr.right) };

      case "UnaryExpr":
        if (expr.op === "NOT") return { ...expr, operand: this.condition(expr.operand) };
        return { ...expr, operand: this.expression(expr.operand) };

      case "Comparison":
        return this.comparison(expr);

      case "InList": {
        const mapped = { ...expr, operand: this.expression(expr.operand), values: expr.values.map((v) => this.expression(v)) };
        return expr.subquery ? { ...mapped, subquery: this.queryExpression(expr.subquery, false) } : mapped;
      }

      case "Exists":
        return { ...expr, subquery: this.queryExpression(expr.subquery, false) };

      case "Between":
      case "LikePattern":
      case "NullCheck":
        return mapChildren(expr, (child) => this.expression(child));

      case "SqlCall":
      case "SqlTemplate":
      case "SqlRaw":
        throw new InternalMorphError(`${expr.type} reached the morpher twice`, { location: expr.location });
    }
  }

  private columnRef(ref: ColumnRef): ColumnRef {
    const resolved = ref.resolved;
    if (resolved?.kind !== "column") {
      throw new InternalMorphError(`Column ${ref.name.name} was not resolved`, { location: ref.location });
    }
    const column = resolved.column;
    const result: ColumnRef = {
      ...ref,
      name: backendIdentifier(column.name, column.caseSensitive ?? false),
    };
    if (ref.qualifier) {
      result.qualifier = resolved.range.map((part) => backendIdentifier(part.name, part.quoted));
    }
    return result;
  }

  /**
   * `CONTAINS(...) = 1` and `<> 0` are the predicate itself; `= 0` and
   * `<> 1` its negation.
   */
  private comparison(expr: Comparison): Expression {
    const { left, right } = expr;
    const fn = isPredicate(left) ? left : isPredicate(right) ? right : undefined;
    if (!fn) {
      return { ...expr, left: this.expression(left), right: this.expression(right) };
    }

    const other = fn === left ? right : left;
    const flag = other.type === "Literal" && other.kind === "integer" ? other.value : undefined;
    if ((expr.op !== "=" && expr.op !== "<>") || (flag !== 0 && flag !== 1)) {
      throw new UnsupportedFeatureError(`${fn.name.toUpperCase()} can only be compared to 0 or 1 with = or <>`, {
        location: expr.location,
        token: fn.name,
      });
    }

    const predicate = this.predicate(fn);
    const holds = (expr.op === "=") === (flag === 1);
    return holds ? predicate : { type: "UnaryExpr", op: "NOT", operand: predicate, location: expr.location };
  }

  private functionCall(expr: FunctionCall): Expression {
    const signature = expr.signature;
    if (!signature) {
      throw new InternalMorphError(`Function ${expr.name} was not resolved`, { location: expr.location });
    }

    const translation = signature.translate;
    switch (translation.kind) {
      case "call": {
        const result = call(translation.name, expr.args.map((arg) => this.expression(arg)), expr.location);
        if (expr.quantifier) result.quantifier = expr.quantifier;
        if (expr.star) result.star = true;
        return result;
      }
      case "template":
        return template(translation.template, expr.args.map((arg) => this.expression(arg)), expr.location);
      case "geometry":
        return this.geometryFunction(translation.op, expr);
      case "unsupported":
        throw new UnsupportedFeatureError(translation.reason, { location: expr.location, token: expr.name });
    }
  }

  /** CONTAINS / INTERSECTS rendered as a boolean. */
  private predicate(expr: FunctionCall): Expression {
    const op = expr.signature?.translate;
    if (op?.kind !== "geometry") {
      throw new InternalMorphError(`${expr.name} is not a geometry predicate`, { location: expr.location });
    }
    return this.geometryFunction(op.op, expr);
  }

  // ==========================================================================
  // Geometry
  // ==========================================================================

  private geometryFunction(op: GeometryOperation, expr: FunctionCall): Expression {
    const location = expr.location;
    const [first, second] = expr.args;
    if (!first) {
      throw new InternalMorphError(`${expr.name} without arguments`, { location });
    }

    switch (op) {
      case "contains":
      case "intersects": {
        if (!second) throw new InternalMorphError(`${expr.name} needs two arguments`, { location });
        if (op === "intersects") {
          if (first.info?.type === "point") return this.contains(first, second, location);
          if (second.info?.type === "point") return this.contains(second, first, location);
          return this.binaryGeometry("({0} && {1})", first, second, location);
        }
        return this.contains(first, second, location);
      }

      case "distance": {
        if (expr.args.length === 4) {
          const [x1, y1, x2, y2] = expr.args;
          if (!x1 || !y1 || !x2 || !y2) throw new InternalMorphError("DISTANCE needs four arguments", { location });
          const a: GeometryLiteral = { type: "GeometryLiteral", shape: "POINT", args: [x1, y1], location };
          const b: GeometryLiteral = { type: "GeometryLiteral", shape: "POINT", args: [x2, y2], location };
          return template("DEGREES({0} <-> {1})", [this.geometry(a), this.geometry(b)], location);
        }
        if (!second) throw new InternalMorphError("DISTANCE needs two points", { location });
        return this.binaryGeometry("DEGREES({0} <-> {1})", first, second, location);
      }

      case "area":
        return template("DEGREES(DEGREES(AREA({0})))", [this.geometryValue(first)], location);

      case "centroid":
        if (first.info?.type === "point") return this.geometryValue(first);
        if (first.info?.type === "circle") return template("@@({0})", [this.geometryValue(first)], location);
        throw new UnsupportedFeatureError(`CENTROID of a ${first.info?.type ?? "geometry"} is not supported`, {
          location,
          token: expr.name,
        });

      case "coord1":
      case "coord2": {
        if (first.type === "GeometryLiteral" && first.shape === "POINT") {
          const coordinate = first.args[op === "coord1" ? 0 : 1];
          if (coordinate) return this.expression(coordinate);
        }
        const fn = op === "coord1" ? "long" : "lat";
        return template(`DEGREES(${fn}({0}))`, [this.geometryValue(first)], location);
      }

      case "coordsys": {
        const value = first.info?.frame ?? "UNKNOWN";
        return {
          type: "Literal",
          kind: "string",
          value,
          raw: `'${value.replace(/'/g, "''")}'`,
          location,
          info: { type: "varchar", unit: "", ucd: "meta.ref;pos.frame" },
        };
      }
    }
  }

  private binaryGeometry(
    text: string,
    first: Expression,
    second: Expression,
    location: SourceLocation | undefined
  ): Expression {
    const target = this.frameOf(first);
    return template(text, [this.geometryValue(first), this.geometryValue(second, target)], location);
  }

  private contains(point: Expression, shape: Expression, location: SourceLocation | undefined): Expression {
    if (this.q3c) {
      const indexed = this.q3cContains(point, shape, location);
      if (indexed) return indexed;
    }
    return this.binaryGeometry("({0} @ {1})", point, shape, location);
  }

  /**
   * `q3c_radial_query` / `q3c_poly_query` for a POINT of two spatially
   * indexed columns tested against a constant circle or polygon.
   */
  private q3cContains(point: Expression, shape: Expression, location: SourceLocation | undefined): Expression | undefined {
    if (point.type !== "GeometryLiteral" || point.shape !== "POINT") return undefined;
    const columns = point.args.filter((arg): arg is ColumnRef => arg.type === "ColumnRef");
    if (columns.length !== 2 || !columns.every((column) => this.spatiallyIndexed(column))) return undefined;
    if (shape.type !== "GeometryLiteral") return undefined;

    const literal = this.shapeLiteral(shape);
    if (!literal || literal.shape === "POINT") return undefined;

    const converted = this.convertShape(literal, this.frameOf(point));
    if (!converted) return undefined;

    const [lon, lat] = columns.map((column) => this.columnRef(column));
    if (!lon || !lat) return undefined;

    if (converted.shape === "CIRCLE") {
      const [center = { lon: 0, lat: 0 }] = converted.points;
      return call(
        "q3c_radial_query",
        [lon, lat, raw(formatNumber(center.lon)), raw(formatNumber(center.lat)), raw(formatNumber(converted.radius ?? 0))],
        location
      );
    }
    const vertices = converted.points.flatMap((p) => [formatNumber(p.lon), formatNumber(p.lat)]);
    return call("q3c_poly_query", [lon, lat, raw(`ARRAY[${vertices.join(", ")}]`)], location);
  }

  private spatiallyIndexed(ref: ColumnRef): boolean {
    const resolved = ref.resolved;
    if (resolved?.kind !== "column" || !resolved.table) return false;
    const name = resolved.column.name.toLowerCase();
    return resolved.table.spatialIndex.some((indexed) => indexed.toLowerCase() === name);
  }

  /** Frame tag of a geometry expression; `''` when unknown. */
  private frameOf(expr: Expression): string {
    if (expr.type === "GeometryLiteral" && expr.shape === "REGION") {
      return this.shapeLiteral(expr)?.frame ?? "";
    }
    return expr.info?.frame ?? "";
  }

  /** The constant shape `node` describes, or undefined if any argument depends on data. */
  private shapeLiteral(node: GeometryLiteral): ShapeLiteral | undefined {
    if (node.shape === "REGION") {
      const [source] = node.args;
      if (source?.type !== "Literal" || source.kind !== "string") return undefined;
      const parsed = parseStcs(source.value);
      return parsed ? shapeFromValues(parsed.shape, parsed.frame, parsed.values) : undefined;
    }
    const values = node.args.map(evaluateNumeric);
    if (values.some((value) => value === undefined)) return undefined;
    return shapeFromValues(
      node.shape,
      node.coordSys ?? "",
      values.filter((value): value is number => value !== undefined)
    );
  }

  private convertShape(shape: ShapeLiteral, target: string): ShapeLiteral | undefined {
    if (framesCompatible(shape.frame, target)) return shape;
    const points: SkyPoint[] = [];
    for (const point of shape.points) {
      const converted = this.conversions.convert(shape.frame, target, point);
      if (!converted) return undefined;
      points.push(converted);
    }
    return { ...shape, frame: target, points };
  }

  /** A geometry expression as pgSphere SQL, converted into `target` if given. */
  private geometryValue(expr: Expression, target?: string): Expression {
    const source = this.frameOf(expr);
    if (target === undefined || framesCompatible(source, target)) {
      return expr.type === "GeometryLiteral" ? this.geometry(expr) : this.expression(expr);
    }

    if (expr.type === "GeometryLiteral") {
      const literal = this.shapeLiteral(expr);
      const converted = literal ? this.convertShape(literal, target) : undefined;
      if (converted) return raw(renderShape(converted), expr.location);
    }

    const transform = this.conversions.sqlTransform(source, target);
    if (transform === undefined) {
      throw new UnsupportedFeatureError(`No conversion from ${source} to ${target} is available`, {
        location: expr.location,
        token: source,
      });
    }
    const value = expr.type === "GeometryLiteral" ? this.geometry(expr) : this.expression(expr);
    return transform ? template(`({0} ${transform})`, [value], expr.location) : value;
  }

  private geometry(node: GeometryLiteral): Expression {
    const literal = this.shapeLiteral(node);
    if (literal) return raw(renderShape(literal), node.location);

    const argument = (arg: Expression): Expression => {
      const value = evaluateNumeric(arg);
      return value === undefined ? this.expression(postprocess(arg)) : raw(formatNumber(value), arg.location);
    };
    const radians = (arg: Expression) => call("RADIANS", [argument(arg)]);

    const [x, y, r] = node.args;
    switch (node.shape) {
      case "POINT":
        if (x && y) return call("spoint", [radians(x), radians(y)], node.location);
        break;
      case "CIRCLE":
        if (x && y && r) {
          return call("scircle", [call("spoint", [radians(x), radians(y)]), radians(r)], node.location);
        }
        break;
      default:
        throw new UnsupportedFeatureError(`${node.shape} is only supported with constant arguments`, {
          location: node.location,
          token: node.shape,
        });
    }
    throw new InternalMorphError(`${node.shape} has too few arguments`, { location: node.location });
  }
}

/** Morph an annotated tree into backend form. */
export function morph(tree: QueryExpression, options: MorphOptions = {}): QueryExpression {
  return new Morpher(options).queryExpression(tree, true);
}
