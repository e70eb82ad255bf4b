import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { catalogFromDocument } from "../src/catalog-loader.ts";
import type { CatalogSnapshot } from "../src/catalog.ts";
import { compile, type CompileOptions } from "../src/compiler.ts";
import { loadConfig } from "../src/config.ts";
import { createLogger } from "../src/logger.ts";
import type { CompiledQuery, CompileError } from "../src/types.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));

export function loadTestCatalog(): CatalogSnapshot {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, "fixtures", "catalog.json"), "utf-8"));
  return catalogFromDocument(raw);
}

export const catalog = loadTestCatalog();

/** Compile against the fixture catalog with environment-independent defaults. */
export function compileQuery(query: string, options: Partial<CompileOptions> = {}) {
  return compile(query, {
    catalog,
    config: loadConfig({}),
    logger: createLogger({ level: "error", write: () => {} }),
    ...options,
  });
}

export function compiled(query: string, options: Partial<CompileOptions> = {}): CompiledQuery {
  const result = compileQuery(query, options);
  if (!result.success) {
    throw new Error(`Expected ${query} to compile: ${result.error.kind}: ${result.error.message}`);
  }
  return { sql: result.sql, parameters: result.parameters, outputColumns: result.outputColumns };
}

export function failure(query: string, options: Partial<CompileOptions> = {}): CompileError {
  const result = compileQuery(query, options);
  if (result.success) {
    throw new Error(`Expected ${query} to fail, got ${result.sql}`);
  }
  return result.error;
}
