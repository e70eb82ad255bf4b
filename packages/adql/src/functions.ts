/**
 * Function Registry
 *
 * Signatures keyed by upper-cased name. The built-in set is read from
 * `data/functions.json`: the standard ADQL functions plus the backend's own
 * additions.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { acceptsParam } from "./coercion.ts";
import { functionTableSchema } from "./schemas.ts";
import type { AdqlType, FunctionSignature } from "./types.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));

export function arityMatches(signature: FunctionSignature, arity: number): boolean {
  if (signature.variadic !== undefined) return arity >= signature.params.length;
  return arity === signature.params.length;
}

function typesMatch(signature: FunctionSignature, argTypes: readonly AdqlType[]): boolean {
  return argTypes.every((type, index) => {
    const param = signature.params[index] ?? signature.variadic;
    return param !== undefined && acceptsParam(param, type);
  });
}

export class FunctionRegistry {
  private readonly signatures = new Map<string, FunctionSignature[]>();

  register(signature: FunctionSignature): this {
    const key = signature.name.toUpperCase();
    const existing = this.signatures.get(key) ?? [];
    this.signatures.set(key, [...existing, signature]);
    return this;
  }

  has(name: string): boolean {
    return this.signatures.has(name.toUpperCase());
  }

  candidates(name: string): readonly FunctionSignature[] {
    return this.signatures.get(name.toUpperCase()) ?? [];
  }

  /**
   * The signature accepting `argTypes`, fixed-arity ones before variadic.
   * `star` selects the `COUNT(*)` form.
   */
  lookup(name: string, argTypes: readonly AdqlType[], star = false): FunctionSignature | undefined {
    const matching = this.candidates(name).filter(
      (signature) =>
        (signature.star ?? false) === star &&
        arityMatches(signature, argTypes.length) &&
        typesMatch(signature, argTypes)
    );
    return matching.find((signature) => signature.variadic === undefined) ?? matching[0];
  }

  /** A copy with `signatures` added, leaving this registry untouched. */
  extend(signatures: readonly FunctionSignature[]): FunctionRegistry {
    const registry = new FunctionRegistry();
    for (const list of this.signatures.values()) {
      list.forEach((signature) => registry.register(signature));
    }
    signatures.forEach((signature) => registry.register(signature));
    return registry;
  }
}

let builtinTable: { standard: FunctionSignature[]; backend: FunctionSignature[] } | undefined;

function loadBuiltinTable(): { standard: FunctionSignature[]; backend: FunctionSignature[] } {
  if (!builtinTable) {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, "data", "functions.json"), "utf-8"));
    builtinTable = functionTableSchema.parse(raw);
  }
  return builtinTable;
}

export interface BuiltinFunctionOptions {
  /** Include gavo_match, ivo_hasword and friends (default true) */
  backend?: boolean;
}

export function createBuiltinFunctions(options: BuiltinFunctionOptions = {}): FunctionRegistry {
  const table = loadBuiltinTable();
  const registry = new FunctionRegistry();
  table.standard.forEach((signature) => registry.register(signature));
  if (options.backend ?? true) {
    table.backend.forEach((signature) => registry.register(signature));
  }
  return registry;
}
