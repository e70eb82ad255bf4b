/**
 * Backend identifier folding. PostgreSQL folds unquoted names to lower case,
 * so a name is emitted bare only when folding leaves it unchanged and it is
 * not a reserved word.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Identifier } from "./types.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));

const PLAIN_IDENTIFIER = /^[a-z_][a-z0-9_$]*$/;

let reservedWords: ReadonlySet<string> | undefined;

function reserved(): ReadonlySet<string> {
  if (!reservedWords) {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, "data", "postgres-reserved.json"), "utf-8"));
    reservedWords = new Set(z.array(z.string()).parse(raw));
  }
  return reservedWords;
}

/**
 * The identifier as the backend should see it. `quoted` on the result means
 * "emit in double quotes, exactly as named".
 */
export function backendIdentifier(name: string, caseSensitive: boolean): Identifier {
  const folded = caseSensitive ? name : name.toLowerCase();
  return { name: folded, quoted: !PLAIN_IDENTIFIER.test(folded) || reserved().has(folded) };
}

/** The label a result column gets from the backend for this identifier. */
export function backendLabel(name: string, caseSensitive: boolean): string {
  return caseSensitive ? name : name.toLowerCase();
}

export function renderIdentifier(identifier: Identifier): string {
  return identifier.quoted ? `"${identifier.name.replace(/"/g, '""')}"` : identifier.name;
}
