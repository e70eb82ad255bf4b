/**
 * Compilation Errors
 *
 * Every stage fails fast by throwing one of these; `compile()` turns them
 * into the structured `CompileError` value.
 */

import type { CompileError, ErrorKind, Position, SourceLocation } from "./types.ts";

export abstract class AdqlError extends Error {
  abstract readonly kind: ErrorKind;
  readonly position?: Position;
  readonly token?: string;

  constructor(message: string, options: { location?: SourceLocation; token?: string } = {}) {
    super(message);
    this.name = new.target.name;
    if (options.location) {
      this.position = options.location.start;
    }
    if (options.token !== undefined) {
      this.token = options.token;
    }
  }

  toJSON(): CompileError {
    const error: CompileError = { kind: this.kind, message: this.message };
    if (this.position) error.position = this.position;
    if (this.token !== undefined) error.token = this.token;
    return error;
  }
}

export class QuerySyntaxError extends AdqlError {
  readonly kind = "SyntaxError";

  constructor(
    message: string,
    readonly expected: string[],
    options: { location?: SourceLocation; token?: string } = {}
  ) {
    super(message, options);
  }

  override toJSON(): CompileError {
    return { ...super.toJSON(), expected: [...this.expected] };
  }
}

export class UnknownTableError extends AdqlError {
  readonly kind = "UnknownTableError";
}

export class UnknownColumnError extends AdqlError {
  readonly kind = "UnknownColumnError";
}

export class AmbiguousColumnError extends AdqlError {
  readonly kind = "AmbiguousColumnError";
}

export class TypeMismatchError extends AdqlError {
  readonly kind = "TypeMismatchError";
}

export class UnsupportedFunctionError extends AdqlError {
  readonly kind = "UnsupportedFunctionError";
}

export class ArityMismatchError extends AdqlError {
  readonly kind = "ArityMismatchError";
}

export class UnsupportedFeatureError extends AdqlError {
  readonly kind = "UnsupportedFeatureError";
}

export class RecursionLimitError extends AdqlError {
  readonly kind = "RecursionLimitError";
}

export class InternalMorphError extends AdqlError {
  readonly kind = "InternalMorphError";
}

export function formatError(error: CompileError): string {
  const where = error.position ? ` [${error.position.line}:${error.position.column}]` : "";
  return `${error.kind}${where}: ${error.message}`;
}
