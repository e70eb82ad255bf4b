/**
 * Zod schemas for the JSON documents the compiler reads: the function table
 * shipped in src/data and catalog files handed to the CLI.
 */

import { z } from "zod";

export const adqlTypeSchema = z.enum([
  "smallint",
  "integer",
  "bigint",
  "real",
  "double",
  "char",
  "varchar",
  "unicodeChar",
  "clob",
  "timestamp",
  "boolean",
  "point",
  "circle",
  "polygon",
  "region",
  "blob",
  "null",
]);

export const paramTypeSchema = z.union([
  adqlTypeSchema,
  z.enum(["numeric", "string", "geometry", "any"]),
]);

const metaRuleSchema = z.union([
  z.literal("keep"),
  z.object({ unit: z.string(), ucd: z.string() }),
  z.object({ ucdPrefix: z.string() }),
]);

const translationSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("call"), name: z.string() }),
  z.object({ kind: z.literal("template"), template: z.string() }),
  z.object({
    kind: z.literal("geometry"),
    op: z.enum([
      "area",
      "centroid",
      "contains",
      "intersects",
      "distance",
      "coord1",
      "coord2",
      "coordsys",
    ]),
  }),
  z.object({ kind: z.literal("unsupported"), reason: z.string() }),
]);

export const functionSignatureSchema = z.object({
  name: z.string().min(1),
  params: z.array(paramTypeSchema),
  variadic: paramTypeSchema.optional(),
  returns: z.union([adqlTypeSchema, z.literal("arg0")]),
  aggregate: z.boolean().optional(),
  predicate: z.boolean().optional(),
  star: z.boolean().optional(),
  meta: metaRuleSchema.optional(),
  translate: translationSchema,
});

export const functionTableSchema = z.object({
  standard: z.array(functionSignatureSchema),
  backend: z.array(functionSignatureSchema),
});

// ============================================================================
// Catalog documents
// ============================================================================

export const columnMetaSchema = z.object({
  name: z.string().min(1),
  type: adqlTypeSchema,
  unit: z.string().default(""),
  ucd: z.string().default(""),
  nullable: z.boolean().default(true),
  primaryKey: z.boolean().default(false),
  indexed: z.boolean().default(false),
  geometry: z.boolean().default(false),
  caseSensitive: z.boolean().optional(),
  frame: z.string().optional(),
  description: z.string().optional(),
});

export const tableMetaSchema = z.object({
  schema: z.string().min(1).optional(),
  name: z.string().min(1),
  caseSensitive: z.boolean().optional(),
  columns: z.array(columnMetaSchema).min(1),
  primaryKey: z.array(z.string()).default([]),
  spatialIndex: z.array(z.string()).default([]),
  description: z.string().optional(),
});

export const catalogDocumentSchema = z.object({
  version: z.string().default("1"),
  tables: z.array(tableMetaSchema),
});

export type CatalogDocument = z.infer<typeof catalogDocumentSchema>;
