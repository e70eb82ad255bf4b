/**
 * Compiler configuration from environment variables. Options passed to
 * `compile()` take precedence over these.
 */

import { DEFAULT_MAX_DEPTH } from "./annotator.ts";
import type { PlaceholderStyle } from "./emitter.ts";
import { DEFAULT_MAX_NESTING } from "./parser.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "json" | "pretty";

export type DebugCategory = "parser" | "annotator" | "morpher" | "emitter";

export const DEBUG_CATEGORIES: readonly DebugCategory[] = ["parser", "annotator", "morpher", "emitter"];

export interface CompilerConfig {
  maxNesting: number;
  maxDepth: number;
  /** Row cap for the outermost query; unset means no cap */
  maxRows?: number;
  q3c: boolean;
  placeholder: PlaceholderStyle;
  logLevel: LogLevel;
  logFormat: LogFormat;
  debug: DebugCategory[];
}

export type Environment = Readonly<Record<string, string | undefined>>;

const toBool = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined || value === "") {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") return true;
  if (normalized === "false" || normalized === "0" || normalized === "no") return false;
  return defaultValue;
};

const toPositiveInteger = (value: string | undefined): number | undefined => {
  if (!value) {
    return undefined;
  }

  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? undefined : parsed;
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return normalized;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  return value.trim().toLowerCase() === "json" ? "json" : defaultValue;
};

const toPlaceholder = (value: string | undefined): PlaceholderStyle =>
  value?.trim().toLowerCase() === "named" ? "named" : "positional";

function isDebugCategory(value: string): value is DebugCategory {
  return DEBUG_CATEGORIES.some((category) => category === value);
}

/** `ADQL_DEBUG=parser,morpher`; `all` or `*` enables every category. */
const toCategories = (value: string | undefined): DebugCategory[] => {
  if (!value) {
    return [];
  }

  const names = value
    .split(",")
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);
  if (names.includes("all") || names.includes("*")) {
    return [...DEBUG_CATEGORIES];
  }
  return names.filter(isDebugCategory);
};

export function loadConfig(env: Environment = process.env): CompilerConfig {
  const debug = toCategories(env["ADQL_DEBUG"]);
  const config: CompilerConfig = {
    maxNesting: toPositiveInteger(env["ADQL_MAX_NESTING"]) ?? DEFAULT_MAX_NESTING,
    maxDepth: toPositiveInteger(env["ADQL_MAX_DEPTH"]) ?? DEFAULT_MAX_DEPTH,
    q3c: toBool(env["ADQL_Q3C"], true),
    placeholder: toPlaceholder(env["ADQL_PLACEHOLDER"]),
    // Asking for debug categories implies debug output
    logLevel: toLogLevel(env["ADQL_LOG_LEVEL"], debug.length > 0 ? "debug" : "warn"),
    logFormat: toLogFormat(env["ADQL_LOG_FORMAT"], "pretty"),
    debug,
  };

  const maxRows = toPositiveInteger(env["ADQL_MAX_ROWS"]);
  if (maxRows !== undefined) {
    config.maxRows = maxRows;
  }
  return config;
}
