/**
 * ADQL CLI
 *
 * Command-line interface for the ADQL compiler.
 * Usage: adql compile <query.adql> --catalog <catalog.json> [-o output.sql]
 */

import { readFileSync, writeFileSync, existsSync } from "node:fs";
import { resolve, basename, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { CatalogFormatError, loadCatalogFile } from "./catalog-loader.ts";
import type { CatalogSnapshot } from "./catalog.ts";
import { compile } from "./compiler.ts";
import { loadConfig } from "./config.ts";
import { formatError } from "./errors.ts";
import { createLogger } from "./logger.ts";
import type { CompiledQuery } from "./types.ts";

interface CLIOptions {
  command: string;
  inputFile: string;
  catalogFile: string | null;
  outputFile: string | null;
  maxRows: number | undefined;
  q3c: boolean | undefined;
  named: boolean;
  json: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

const HELP_TEXT = `
ADQL Compiler
Translates ADQL queries to PostgreSQL with pgSphere and q3c

Usage:
  adql compile <query.adql> --catalog <catalog.json> [-o output.sql]
  adql --help
  adql --version

Commands:
  compile    Compile an ADQL query to SQL

Options:
  -c, --catalog <file>  Catalog document describing the tables (required)
  -o, --output <file>   Write output to file (default: stdout)
  --max-rows <n>        Cap the number of rows the query returns
  --no-q3c              Never rewrite spatial predicates to q3c calls
  --named               Use :p1 placeholders instead of $1
  --json                Print the full result as JSON
  -v, --verbose         Show verbose output
  -h, --help            Show this help message
  --version             Show version number

Examples:
  adql compile cone.adql --catalog catalog.json
  adql compile cone.adql -c catalog.json --max-rows 1000 -o cone.sql
  adql compile cone.adql -c catalog.json --json > cone.json
`;

class ArgParser {
  private index = 0;

  constructor(private args: string[]) {}

  current(): string | undefined {
    return this.args[this.index];
  }

  next(): string | undefined {
    this.index++;
    return this.args[this.index];
  }

  advance(): void {
    this.index++;
  }

  hasMore(): boolean {
    return this.index < this.args.length;
  }
}

function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: "",
    inputFile: "",
    catalogFile: null,
    outputFile: null,
    maxRows: undefined,
    q3c: undefined,
    named: false,
    json: false,
    verbose: false,
    help: false,
    version: false,
  };

  const parser = new ArgParser(args);

  while (parser.hasMore()) {
    const arg = parser.current();
    if (!arg) {
      parser.advance();
      continue;
    }

    if (arg === "-h" || arg === "--help") {
      options.help = true;
    } else if (arg === "--version") {
      options.version = true;
    } else if (arg === "-v" || arg === "--verbose") {
      options.verbose = true;
    } else if (arg === "--json") {
      options.json = true;
    } else if (arg === "--named") {
      options.named = true;
    } else if (arg === "--no-q3c") {
      options.q3c = false;
    } else if (arg === "-o" || arg === "--output") {
      const nextArg = parser.next();
      if (nextArg) {
        options.outputFile = nextArg;
      }
    } else if (arg === "-c" || arg === "--catalog") {
      const nextArg = parser.next();
      if (nextArg) {
        options.catalogFile = nextArg;
      }
    } else if (arg === "--max-rows") {
      const parsed = parseInt(parser.next() ?? "", 10);
      if (!isNaN(parsed) && parsed > 0) {
        options.maxRows = parsed;
      }
    } else if (!arg.startsWith("-")) {
      if (!options.command) {
        options.command = arg;
      } else if (!options.inputFile) {
        options.inputFile = arg;
      }
    }
    parser.advance();
  }

  return options;
}

// Exact integers beyond 2^53 are printed as JSON strings
const bigintToString = (_key: string, value: unknown): unknown =>
  typeof value === "bigint" ? value.toString() : value;

/** SQL followed by comment lines describing parameters and output columns. */
function formatCompiled(compiled: CompiledQuery): string {
  const lines = [compiled.sql];
  for (const parameter of compiled.parameters) {
    lines.push(`-- param ${parameter.index}: ${JSON.stringify(parameter.value, bigintToString)} (${parameter.type})`);
  }
  for (const column of compiled.outputColumns) {
    const details = [column.type, column.unit && `unit=${column.unit}`, column.ucd && `ucd=${column.ucd}`];
    lines.push(`-- column ${column.name}: ${details.filter(Boolean).join(" ")}`);
  }
  return lines.join("\n");
}

function readCatalog(path: string): CatalogSnapshot {
  try {
    return loadCatalogFile(resolve(process.cwd(), path));
  } catch (err) {
    if (err instanceof CatalogFormatError) {
      console.error(`Error: ${err.message}`);
    } else {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Error reading catalog: ${message}`);
    }
    process.exit(1);
  }
}

function main(): void {
  const args = process.argv.slice(2);
  const options = parseArgs(args);

  if (options.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (options.version) {
    console.log(`adql version ${readVersion()}`);
    process.exit(0);
  }

  if (!options.command) {
    console.error("Error: No command specified");
    console.log(HELP_TEXT);
    process.exit(1);
  }

  if (options.command !== "compile") {
    console.error(`Error: Unknown command '${options.command}'`);
    console.log(HELP_TEXT);
    process.exit(1);
  }

  if (!options.inputFile) {
    console.error("Error: No input file specified");
    console.log(HELP_TEXT);
    process.exit(1);
  }

  if (!options.catalogFile) {
    console.error("Error: No catalog specified (use --catalog <file>)");
    process.exit(1);
  }

  const inputPath = resolve(process.cwd(), options.inputFile);

  if (!existsSync(inputPath)) {
    console.error(`Error: File not found: ${options.inputFile}`);
    process.exit(1);
  }

  let source: string;
  try {
    source = readFileSync(inputPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error reading file: ${message}`);
    process.exit(1);
  }

  const catalog = readCatalog(options.catalogFile);
  const config = loadConfig();
  const logger = createLogger({
    level: options.verbose && config.logLevel !== "debug" ? "info" : config.logLevel,
    format: config.logFormat,
    categories: config.debug,
  });

  logger.info(`Compiling ${basename(inputPath)}`, { catalogVersion: catalog.version });

  const result = compile(source, {
    catalog,
    config,
    logger,
    maxRows: options.maxRows,
    q3c: options.q3c,
    placeholder: options.named ? "named" : undefined,
  });

  if (!result.success) {
    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.error(formatError(result.error));
    }
    process.exit(1);
  }

  const compiled: CompiledQuery = { sql: result.sql, parameters: result.parameters, outputColumns: result.outputColumns };
  const output = options.json ? JSON.stringify(compiled, bigintToString, 2) : formatCompiled(compiled);

  if (options.outputFile) {
    const outputPath = resolve(process.cwd(), options.outputFile);
    try {
      writeFileSync(outputPath, `${output}\n`);
      logger.info(`Output written to ${options.outputFile}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Error writing file: ${message}`);
      process.exit(1);
    }
  } else {
    console.log(output);
  }
}

main();
