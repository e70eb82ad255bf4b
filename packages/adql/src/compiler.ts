/**
 * ADQL Compiler
 *
 * Main entry point: query text in, `(sql, parameters, outputColumns)` out.
 * Stages run strictly in sequence and each returns a fresh tree; the catalog
 * snapshot is only read.
 */

import { annotate } from "./annotator.ts";
import { loadConfig, type CompilerConfig } from "./config.ts";
import type { CoordinateConversions } from "./coordsys.ts";
import { emit, type PlaceholderStyle } from "./emitter.ts";
import { AdqlError, InternalMorphError, formatError } from "./errors.ts";
import { createBuiltinFunctions, type FunctionRegistry } from "./functions.ts";
import { byteOffset } from "./lexer.ts";
import { createLogger, type Logger } from "./logger.ts";
import { morph } from "./morpher.ts";
import { parse } from "./parser.ts";
import type { CompiledQuery, CompileError, CompileResult, MetadataCatalog } from "./types.ts";

export interface CompileOptions {
  catalog: MetadataCatalog;
  /** Built-in functions with backend additions by default */
  functions?: FunctionRegistry;
  conversions?: CoordinateConversions;
  maxNesting?: number;
  maxDepth?: number;
  maxRows?: number;
  q3c?: boolean;
  placeholder?: PlaceholderStyle;
  logger?: Logger;
  /** Defaults for unset options; read from the environment when omitted */
  config?: CompilerConfig;
}

let defaultFunctions: FunctionRegistry | undefined;

function builtinFunctions(): FunctionRegistry {
  defaultFunctions ??= createBuiltinFunctions();
  return defaultFunctions;
}

function toCompileError(error: unknown): AdqlError {
  if (error instanceof AdqlError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new InternalMorphError(`Compilation failed: ${message}`);
}

/**
 * Compile an ADQL query.
 *
 * @returns the SQL, its bound parameters and output columns, or a structured error
 */
export function compile(query: string, options: CompileOptions): CompileResult {
  const config = options.config ?? loadConfig();
  const logger =
    options.logger ?? createLogger({ level: config.logLevel, format: config.logFormat, categories: config.debug });

  try {
    const tree = logger.time("parser", "parse", () =>
      parse(query, { maxNesting: options.maxNesting ?? config.maxNesting })
    );

    const annotated = logger.time("annotator", "annotate", () =>
      annotate(tree, options.catalog, options.functions ?? builtinFunctions(), {
        maxDepth: options.maxDepth ?? config.maxDepth,
      })
    );
    logger.debug("annotator", "resolved output columns", {
      catalogVersion: annotated.catalogVersion,
      columns: annotated.outputColumns.map((column) => column.name),
    });

    const maxRows = options.maxRows ?? config.maxRows;
    const morphed = logger.time("morpher", "morph", () =>
      morph(annotated.tree, {
        q3c: options.q3c ?? config.q3c,
        maxRows,
        conversions: options.conversions,
      })
    );

    const { sql, parameters } = logger.time("emitter", "emit", () =>
      emit(morphed, { placeholder: options.placeholder ?? config.placeholder })
    );
    logger.debug("emitter", "emitted SQL", { sql, parameterCount: parameters.length });

    return { success: true, sql, parameters, outputColumns: annotated.outputColumns };
  } catch (caught) {
    const error = toCompileError(caught);
    if (error instanceof InternalMorphError) {
      logger.error("internal compiler error", { error: caught });
    } else {
      logger.debug("parser", "compilation rejected", { kind: error.kind, message: error.message });
    }
    const structured = error.toJSON();
    if (structured.position) {
      structured.position = { ...structured.position, offset: byteOffset(query, structured.position.offset) };
    }
    return { success: false, error: structured };
  }
}

/** Thrown by `compileOrThrow`; carries the structured error. */
export class CompilationFailedError extends Error {
  constructor(readonly error: CompileError) {
    super(formatError(error));
    this.name = "CompilationFailedError";
  }
}

/**
 * Convenience function that returns the compiled query or throws.
 *
 * @throws CompilationFailedError if compilation fails
 */
export function compileOrThrow(query: string, options: CompileOptions): CompiledQuery {
  const result = compile(query, options);

  if (!result.success) {
    throw new CompilationFailedError(result.error);
  }

  return { sql: result.sql, parameters: result.parameters, outputColumns: result.outputColumns };
}
