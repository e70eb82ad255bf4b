import type { DebugCategory, LogFormat, LogLevel } from "./config.ts";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category?: DebugCategory;
  message: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  categories?: readonly DebugCategory[];
  /** Line sink; stderr by default */
  write?: (line: string) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const replaceErrors = (_key: string, val: unknown): unknown => {
  if (val instanceof Error) {
    return { name: val.name, message: val.message, stack: val.stack };
  }
  return val;
};

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[adql:${category}]` : "[adql]";
  const base = `${timestamp} [${level.toUpperCase()}] ${categoryStr} ${message}`;

  if (Object.keys(rest).length === 0) {
    return base;
  }
  return `${base} ${JSON.stringify(rest, replaceErrors)}`;
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry, replaceErrors);
}

export class Logger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly categories: ReadonlySet<DebugCategory>;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "warn";
    this.format = options.format ?? "pretty";
    this.categories = new Set(options.categories ?? []);
    this.write = options.write ?? ((line) => console.error(line));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  private emit(level: LogLevel, category: DebugCategory | undefined, message: string, payload?: object): void {
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (category) {
      entry.category = category;
    }
    if (payload) {
      Object.assign(entry, payload);
    }
    this.write(this.format === "json" ? formatJson(entry) : formatPretty(entry));
  }

  debugEnabled(category: DebugCategory): boolean {
    return this.categories.has(category) && this.shouldLog("debug");
  }

  debug(category: DebugCategory, message: string, payload?: object): void {
    if (this.debugEnabled(category)) {
      this.emit("debug", category, message, payload);
    }
  }

  info(message: string, payload?: object): void {
    if (this.shouldLog("info")) this.emit("info", undefined, message, payload);
  }

  warn(message: string, payload?: object): void {
    if (this.shouldLog("warn")) this.emit("warn", undefined, message, payload);
  }

  error(message: string, payload?: object): void {
    if (this.shouldLog("error")) this.emit("error", undefined, message, payload);
  }

  /** Run `fn`, logging its duration under `category` at debug level. */
  time<T>(category: DebugCategory, label: string, fn: () => T): T {
    if (!this.debugEnabled(category)) {
      return fn();
    }
    const start = performance.now();
    try {
      return fn();
    } finally {
      this.debug(category, `${label} done`, { durationMs: Math.round((performance.now() - start) * 1000) / 1000 });
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
