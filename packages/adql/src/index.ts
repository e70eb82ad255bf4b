/**
 * ADQL Compiler
 *
 * Compiles ADQL queries to PostgreSQL with the pgSphere and q3c extensions.
 */

export { compile, compileOrThrow, CompilationFailedError } from "./compiler.ts";
export type { CompileOptions } from "./compiler.ts";
export { parse, DEFAULT_MAX_NESTING } from "./parser.ts";
export type { ParseOptions } from "./parser.ts";
export { tokenize } from "./lexer.ts";
export { annotate, expressionKey, DEFAULT_MAX_DEPTH } from "./annotator.ts";
export type { AnnotateOptions, AnnotatedQuery } from "./annotator.ts";
export { postprocess } from "./postprocessor.ts";
export { morph } from "./morpher.ts";
export type { MorphOptions } from "./morpher.ts";
export { emit } from "./emitter.ts";
export type { EmitOptions, EmittedSql, PlaceholderStyle } from "./emitter.ts";
export { CatalogSnapshot } from "./catalog.ts";
export { catalogFromDocument, loadCatalogFile, CatalogFormatError } from "./catalog-loader.ts";
export type { CatalogDocument } from "./schemas.ts";
export { FunctionRegistry, createBuiltinFunctions } from "./functions.ts";
export type { BuiltinFunctionOptions } from "./functions.ts";
export { CoordinateConversions, createDefaultConversions, normalizeFrame } from "./coordsys.ts";
export type { FrameDefinition, PointConverter, SkyPoint } from "./coordsys.ts";
export { parseStcs } from "./stcs.ts";
export type { StcsShape } from "./stcs.ts";
export {
  AdqlError,
  QuerySyntaxError,
  UnknownTableError,
  UnknownColumnError,
  AmbiguousColumnError,
  TypeMismatchError,
  UnsupportedFunctionError,
  ArityMismatchError,
  UnsupportedFeatureError,
  RecursionLimitError,
  InternalMorphError,
  formatError,
} from "./errors.ts";
export { loadConfig, DEBUG_CATEGORIES } from "./config.ts";
export type { CompilerConfig, DebugCategory, Environment, LogFormat, LogLevel } from "./config.ts";
export { Logger, createLogger } from "./logger.ts";
export type { LoggerOptions } from "./logger.ts";
export type * from "./types.ts";
