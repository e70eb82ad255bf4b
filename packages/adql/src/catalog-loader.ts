/**
 * Catalog documents: JSON files describing tables, validated with zod and
 * turned into a `CatalogSnapshot`.
 */

import { readFileSync } from "node:fs";
import { CatalogSnapshot } from "./catalog.ts";
import { catalogDocumentSchema } from "./schemas.ts";

export class CatalogFormatError extends Error {
  constructor(
    message: string,
    readonly issues: string[]
  ) {
    super(message);
    this.name = "CatalogFormatError";
  }
}

export function catalogFromDocument(document: unknown): CatalogSnapshot {
  const result = catalogDocumentSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new CatalogFormatError(`Invalid catalog document:\n  ${issues.join("\n  ")}`, issues);
  }
  return new CatalogSnapshot(result.data.tables, result.data.version);
}

export function loadCatalogFile(path: string): CatalogSnapshot {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new CatalogFormatError(`Catalog ${path} is not valid JSON: ${error.message}`, [error.message]);
    }
    throw error;
  }
  return catalogFromDocument(document);
}
