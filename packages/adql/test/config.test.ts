/**
 * Configuration and Logging Tests
 */

import { describe, test, expect } from "vitest";
import { loadConfig } from "../src/config.ts";
import { createLogger } from "../src/logger.ts";
import type { LoggerOptions } from "../src/logger.ts";

describe("loadConfig", () => {
  test("defaults", () => {
    expect(loadConfig({})).toEqual({
      maxNesting: 64,
      maxDepth: 512,
      q3c: true,
      placeholder: "positional",
      logLevel: "warn",
      logFormat: "pretty",
      debug: [],
    });
  });

  test("reads every variable", () => {
    const config = loadConfig({
      ADQL_MAX_NESTING: "10",
      ADQL_MAX_DEPTH: "100",
      ADQL_MAX_ROWS: "2000",
      ADQL_Q3C: "no",
      ADQL_PLACEHOLDER: "named",
      ADQL_LOG_LEVEL: "info",
      ADQL_LOG_FORMAT: "json",
    });
    expect(config).toEqual({
      maxNesting: 10,
      maxDepth: 100,
      maxRows: 2000,
      q3c: false,
      placeholder: "named",
      logLevel: "info",
      logFormat: "json",
      debug: [],
    });
  });

  test("ignores values it cannot use", () => {
    const config = loadConfig({
      ADQL_MAX_NESTING: "-3",
      ADQL_MAX_ROWS: "lots",
      ADQL_Q3C: "maybe",
      ADQL_LOG_LEVEL: "loud",
      ADQL_LOG_FORMAT: "xml",
    });
    expect(config.maxNesting).toBe(64);
    expect(config.maxRows).toBeUndefined();
    expect(config.q3c).toBe(true);
    expect(config.logLevel).toBe("warn");
    expect(config.logFormat).toBe("pretty");
  });

  test("debug categories imply the debug level", () => {
    const config = loadConfig({ ADQL_DEBUG: "Parser, emitter, bogus" });
    expect(config.debug).toEqual(["parser", "emitter"]);
    expect(config.logLevel).toBe("debug");
  });

  test("an explicit level wins over debug categories", () => {
    expect(loadConfig({ ADQL_DEBUG: "parser", ADQL_LOG_LEVEL: "error" }).logLevel).toBe("error");
  });

  test("all enables every category", () => {
    expect(loadConfig({ ADQL_DEBUG: "all" }).debug).toEqual(["parser", "annotator", "morpher", "emitter"]);
  });
});

describe("Logger", () => {
  function capture(options: LoggerOptions) {
    const lines: string[] = [];
    return { lines, logger: createLogger({ ...options, write: (line) => lines.push(line) }) };
  }

  test("drops messages below its level", () => {
    const { lines, logger } = capture({ level: "warn" });
    logger.info("hidden");
    logger.warn("shown");
    logger.error("also shown");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\S+ \[WARN\] \[adql\] shown$/);
  });

  test("pretty lines carry the payload as JSON", () => {
    const { lines, logger } = capture({ level: "info" });
    logger.info("compiled", { rows: 3 });
    expect(lines[0]).toMatch(/^\S+ \[INFO\] \[adql\] compiled \{"rows":3\}$/);
  });

  test("json lines are objects", () => {
    const { lines, logger } = capture({ level: "info", format: "json" });
    logger.info("compiled", { rows: 3 });
    const entry: unknown = JSON.parse(lines[0] ?? "");
    expect(entry).toMatchObject({ level: "info", message: "compiled", rows: 3 });
  });

  test("errors are serialized", () => {
    const { lines, logger } = capture({ format: "json" });
    logger.error("failed", { error: new Error("boom") });
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({ error: { name: "Error", message: "boom" } });
  });

  test("debug output needs its category", () => {
    const { lines, logger } = capture({ level: "debug", categories: ["morpher"] });
    logger.debug("parser", "hidden");
    logger.debug("morpher", "shown");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/\[DEBUG\] \[adql:morpher\] shown$/);
  });

  test("time returns the result and logs the duration", () => {
    const { lines, logger } = capture({ level: "debug", categories: ["emitter"] });
    expect(logger.time("emitter", "emit", () => 42)).toBe(42);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/\[adql:emitter\] emit done \{"durationMs":[\d.e-]+\}$/);
  });

  test("time logs even when the work throws", () => {
    const { lines, logger } = capture({ level: "debug", categories: ["parser"] });
    expect(() =>
      logger.time("parser", "parse", () => {
        throw new Error("bad input");
      })
    ).toThrow("bad input");
    expect(lines).toHaveLength(1);
  });
});
