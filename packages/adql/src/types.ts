/**
 * AST and Metadata Type Definitions for ADQL
 *
 * The parser produces the query nodes below; the annotator returns copies
 * carrying `info`, `resolved` and `signature`; the morpher replaces every
 * ADQL-level construct by the backend nodes at the end of the file.
 */

// ============================================================================
// Core Position Types
// ============================================================================

export interface Position {
  line: number;
  column: number;
  /**
   * Tree locations index the query string; tokens from `toToken` and
   * `CompileError` positions count UTF-8 bytes.
   */
  offset: number;
}

export interface SourceLocation {
  start: Position;
  end: Position;
}

// ============================================================================
// Tokens
// ============================================================================

export type TokenKind = "keyword" | "identifier" | "operator" | "literal" | "punctuation";

export interface Token {
  kind: TokenKind;
  lexeme: string;
  position: Position;
}

// ============================================================================
// Types, Units and UCDs
// ============================================================================

export type AdqlType =
  | "smallint"
  | "integer"
  | "bigint"
  | "real"
  | "double"
  | "char"
  | "varchar"
  | "unicodeChar"
  | "clob"
  | "timestamp"
  | "boolean"
  | "point"
  | "circle"
  | "polygon"
  | "region"
  | "blob"
  | "null";

export interface FieldInfo {
  type: AdqlType;
  unit: string;
  ucd: string;
  /** Coordinate-system tag, verbatim, for geometry-valued expressions */
  frame?: string;
}

// ============================================================================
// Base Node Types
// ============================================================================

interface BaseNode {
  location?: SourceLocation;
}

interface BaseExpression extends BaseNode {
  info?: FieldInfo;
}

export interface Identifier {
  name: string;
  quoted: boolean;
}

// ============================================================================
// Query Expressions
// ============================================================================

export type QueryExpression = Query | SetOp;

export interface Query extends BaseNode {
  type: "Query";
  distinct: boolean;
  top?: number;
  select: SelectList;
  from: FromItem[];
  where?: Expression;
  groupBy: Expression[];
  having?: Expression;
  orderBy: OrderItem[];
  offset?: number;
}

export type SetOperator = "UNION" | "INTERSECT" | "EXCEPT";

export interface SetOp extends BaseNode {
  type: "SetOp";
  op: SetOperator;
  all: boolean;
  left: QueryExpression;
  right: QueryExpression;
  orderBy: OrderItem[];
  /** Only set by the morpher, for a row cap on the outermost query */
  top?: number;
  offset?: number;
}

export interface SelectList extends BaseNode {
  type: "SelectList";
  items: SelectEntry[];
}

export type SelectEntry = SelectItem | SelectStar;

export interface SelectItem extends BaseNode {
  type: "SelectItem";
  expr: Expression;
  alias?: Identifier;
  outputName?: string;
}

export interface SelectStar extends BaseNode {
  type: "SelectStar";
  qualifier?: Identifier[];
}

export interface OrderItem extends BaseNode {
  type: "OrderItem";
  expr: Expression;
  descending: boolean;
}

// ============================================================================
// FROM Clause
// ============================================================================

export type FromItem = TableRef | DerivedTable | Join;

export interface TableRef extends BaseNode {
  type: "TableRef";
  name: Identifier[];
  alias?: Identifier;
  table?: TableMeta;
}

export interface DerivedTable extends BaseNode {
  type: "DerivedTable";
  query: QueryExpression;
  alias: Identifier;
}

export type JoinKind = "INNER" | "LEFT" | "RIGHT" | "FULL" | "CROSS";

export interface Join extends BaseNode {
  type: "Join";
  kind: JoinKind;
  natural: boolean;
  left: FromItem;
  right: FromItem;
  on?: Expression;
  using?: Identifier[];
}

// ============================================================================
// Expressions
// ============================================================================

export type Expression =
  | ColumnRef
  | Literal
  | FunctionCall
  | BinaryExpr
  | UnaryExpr
  | Comparison
  | Between
  | InList
  | LikePattern
  | NullCheck
  | Exists
  | GeometryLiteral
  | SqlCall
  | SqlTemplate
  | SqlRaw;

export type ColumnResolution =
  | {
      kind: "column";
      column: ColumnMeta;
      table?: TableMeta;
      /** Qualifier naming the frame: its alias, or the table's own name */
      range: Identifier[];
      /** Scope level (0 = outermost query) and frame index within it */
      level: number;
      frame: number;
    }
  | { kind: "output"; name: string };

export interface ColumnRef extends BaseExpression {
  type: "ColumnRef";
  qualifier?: Identifier[];
  name: Identifier;
  resolved?: ColumnResolution;
}

export type LiteralValue =
  | { kind: "integer" | "double"; value: number }
  /** Integers beyond 2^53, kept exact */
  | { kind: "bigint"; value: bigint }
  | { kind: "string"; value: string }
  | { kind: "boolean"; value: boolean }
  | { kind: "null"; value: null };

export type Literal = BaseExpression & { type: "Literal"; raw: string } & LiteralValue;

export interface FunctionCall extends BaseExpression {
  type: "FunctionCall";
  name: string;
  args: Expression[];
  quantifier?: "DISTINCT" | "ALL";
  /** COUNT(*) */
  star: boolean;
  signature?: FunctionSignature;
}

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "||";
export type BinaryOperator = ArithmeticOperator | "AND" | "OR";

export interface BinaryExpr extends BaseExpression {
  type: "BinaryExpr";
  op: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface UnaryExpr extends BaseExpression {
  type: "UnaryExpr";
  op: "-" | "+" | "NOT";
  operand: Expression;
}

export type ComparisonOperator = "=" | "<>" | "<" | "<=" | ">" | ">=";

export interface Comparison extends BaseExpression {
  type: "Comparison";
  op: ComparisonOperator;
  left: Expression;
  right: Expression;
}

export interface Between extends BaseExpression {
  type: "Between";
  negated: boolean;
  operand: Expression;
  low: Expression;
  high: Expression;
}

export interface InList extends BaseExpression {
  type: "InList";
  negated: boolean;
  operand: Expression;
  values: Expression[];
  subquery?: QueryExpression;
}

export interface LikePattern extends BaseExpression {
  type: "LikePattern";
  negated: boolean;
  caseInsensitive: boolean;
  operand: Expression;
  pattern: Expression;
}

export interface NullCheck extends BaseExpression {
  type: "NullCheck";
  negated: boolean;
  operand: Expression;
}

export interface Exists extends BaseExpression {
  type: "Exists";
  subquery: QueryExpression;
}

export type GeometryShape = "POINT" | "CIRCLE" | "BOX" | "POLYGON" | "REGION";

export interface GeometryLiteral extends BaseExpression {
  type: "GeometryLiteral";
  shape: GeometryShape;
  coordSys?: string;
  args: Expression[];
}

// ============================================================================
// Backend Nodes (morpher output only)
// ============================================================================

export interface SqlCall extends BaseExpression {
  type: "SqlCall";
  name: string;
  args: Expression[];
  quantifier?: "DISTINCT" | "ALL";
  star?: boolean;
}

/** SQL text with `{0}`, `{1}`, ... standing for rendered arguments */
export interface SqlTemplate extends BaseExpression {
  type: "SqlTemplate";
  template: string;
  args: Expression[];
}

export interface SqlRaw extends BaseExpression {
  type: "SqlRaw";
  sql: string;
}

// ============================================================================
// Metadata Catalog
// ============================================================================

export interface ColumnMeta {
  name: string;
  type: AdqlType;
  unit: string;
  ucd: string;
  nullable: boolean;
  primaryKey: boolean;
  indexed: boolean;
  geometry: boolean;
  caseSensitive?: boolean;
  frame?: string;
  description?: string;
}

export interface TableMeta {
  schema?: string;
  name: string;
  caseSensitive?: boolean;
  columns: readonly ColumnMeta[];
  primaryKey: readonly string[];
  spatialIndex: readonly string[];
  description?: string;
}

export interface MetadataCatalog {
  readonly version: string;
  lookupTable(name: readonly Identifier[]): TableMeta | undefined;
}

// ============================================================================
// Function Signatures
// ============================================================================

export type ParamType = AdqlType | "numeric" | "string" | "geometry" | "any";

export type MetaRule = "keep" | { unit: string; ucd: string } | { ucdPrefix: string };

export type GeometryOperation =
  | "area"
  | "centroid"
  | "contains"
  | "intersects"
  | "distance"
  | "coord1"
  | "coord2"
  | "coordsys";

export type Translation =
  | { kind: "call"; name: string }
  | { kind: "template"; template: string }
  | { kind: "geometry"; op: GeometryOperation }
  | { kind: "unsupported"; reason: string };

export interface FunctionSignature {
  name: string;
  params: readonly ParamType[];
  variadic?: ParamType;
  returns: AdqlType | "arg0";
  aggregate?: boolean;
  /** Integer-valued geometry predicates usable as conditions */
  predicate?: boolean;
  /** COUNT(*) */
  star?: boolean;
  meta?: MetaRule;
  translate: Translation;
}

// ============================================================================
// Compilation Results
// ============================================================================

export interface OutputColumn {
  name: string;
  type: AdqlType;
  unit: string;
  ucd: string;
}

export interface BoundParameter {
  index: number;
  value: string | number | bigint;
  type: AdqlType;
}

export type ErrorKind =
  | "SyntaxError"
  | "UnknownTableError"
  | "UnknownColumnError"
  | "AmbiguousColumnError"
  | "TypeMismatchError"
  | "UnsupportedFunctionError"
  | "ArityMismatchError"
  | "UnsupportedFeatureError"
  | "RecursionLimitError"
  | "InternalMorphError";

export interface CompileError {
  kind: ErrorKind;
  message: string;
  position?: Position;
  token?: string;
  expected?: string[];
}

export interface CompiledQuery {
  sql: string;
  parameters: BoundParameter[];
  outputColumns: OutputColumn[];
}

export type CompileResult =
  | ({ success: true } & CompiledQuery)
  | { success: false; error: CompileError };
