/**
 * Metadata Catalog
 *
 * An immutable, versioned snapshot of table definitions. Compilations hold a
 * reference to the snapshot they started with; a refreshed catalog is a new
 * snapshot.
 */

import type { ColumnMeta, Identifier, MetadataCatalog, TableMeta } from "./types.ts";

// ============================================================================
// Identifier Matching
// ============================================================================

/** Regular identifiers compare case-insensitively, delimited ones exactly. */
export function identifierMatches(identifier: Identifier, name: string): boolean {
  if (identifier.quoted) return identifier.name === name;
  return identifier.name.toLowerCase() === name.toLowerCase();
}

export function matchColumn(columns: readonly ColumnMeta[], name: Identifier): ColumnMeta | undefined {
  return columns.find((column) => identifierMatches(name, column.name));
}

export function qualifiedTableName(table: TableMeta): string {
  return table.schema ? `${table.schema}.${table.name}` : table.name;
}

// ============================================================================
// Snapshot
// ============================================================================

function freezeTable(table: TableMeta): TableMeta {
  return Object.freeze({
    ...table,
    columns: Object.freeze(table.columns.map((column) => Object.freeze({ ...column }))),
    primaryKey: Object.freeze([...table.primaryKey]),
    spatialIndex: Object.freeze([...table.spatialIndex]),
  });
}

export class CatalogSnapshot implements MetadataCatalog {
  readonly version: string;
  private readonly tables: readonly TableMeta[];

  constructor(tables: readonly TableMeta[], version = "1") {
    this.version = version;
    this.tables = Object.freeze(tables.map(freezeTable));
  }

  /**
   * Resolve `table`, `schema.table` or `catalog.schema.table`.
   * An unqualified name prefers a table without schema, then a table whose
   * name is unique across schemas.
   */
  lookupTable(name: readonly Identifier[]): TableMeta | undefined {
    const tableName = name[name.length - 1];
    if (!tableName) return undefined;

    const byName = this.tables.filter((table) => identifierMatches(tableName, table.name));
    const schemaName = name[name.length - 2];

    if (schemaName) {
      return byName.find(
        (table) => table.schema !== undefined && identifierMatches(schemaName, table.schema)
      );
    }

    const unqualified = byName.filter((table) => table.schema === undefined);
    if (unqualified.length === 1) return unqualified[0];
    return byName.length === 1 ? byName[0] : undefined;
  }

  listTables(): readonly TableMeta[] {
    return this.tables;
  }

  /** A new snapshot with `tables` added or replacing same-named ones. */
  withTables(tables: readonly TableMeta[], version: string): CatalogSnapshot {
    const replaced = new Set(tables.map((t) => qualifiedTableName(t).toLowerCase()));
    const kept = this.tables.filter((t) => !replaced.has(qualifiedTableName(t).toLowerCase()));
    return new CatalogSnapshot([...kept, ...tables], version);
  }
}
