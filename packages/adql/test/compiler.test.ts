/**
 * Compiler Tests
 *
 * End-to-end: ADQL text in, SQL text, bound parameters and output columns out.
 */

import { describe, test, expect } from "vitest";
import { compile, compileOrThrow, CompilationFailedError } from "../src/index.ts";
import { createLogger } from "../src/logger.ts";
import { catalog, compileQuery, compiled, failure } from "./helpers.ts";

describe("Basic Queries", () => {
  test("compiles TOP to a bound LIMIT", () => {
    const result = compiled("SELECT TOP 10 id FROM t");
    expect(result.sql).toBe("SELECT id FROM t LIMIT $1");
    expect(result.parameters).toEqual([{ index: 1, value: 10, type: "integer" }]);
    expect(result.outputColumns).toEqual([{ name: "id", type: "integer", unit: "", ucd: "" }]);
  });

  test("expands * in table order", () => {
    const result = compiled("SELECT * FROM t");
    expect(result.sql).toBe("SELECT id, ra, dec FROM t");
    expect(result.outputColumns.map((c) => c.name)).toEqual(["id", "ra", "dec"]);
  });

  test("keywords and names are case-insensitive", () => {
    expect(compiled("select Id from T where RA > 1").sql).toBe("SELECT id FROM t WHERE ra > $1");
  });

  test("binds parameters in textual order", () => {
    const result = compiled("SELECT TOP 5 id FROM t WHERE ra > 10 AND dec < -5");
    expect(result.sql).toBe("SELECT id FROM t WHERE ra > $1 AND dec < $2 LIMIT $3");
    expect(result.parameters.map((p) => p.value)).toEqual([10, -5, 5]);
  });

  test("uses named placeholders when asked", () => {
    const result = compiled("SELECT id FROM t WHERE ra > 10", { placeholder: "named" });
    expect(result.sql).toBe("SELECT id FROM t WHERE ra > :p1");
  });

  test("strings are parameters, booleans and NULL are inline", () => {
    const result = compiled("SELECT name FROM gaia.stars WHERE name = 'Vega' OR name IS NULL");
    expect(result.sql).toBe("SELECT name FROM gaia.stars WHERE name = $1 OR name IS NULL");
    expect(result.parameters).toEqual([{ index: 1, value: "Vega", type: "varchar" }]);
  });

  test("OFFSET becomes a bound parameter", () => {
    const result = compiled("SELECT id FROM t ORDER BY id DESC OFFSET 5");
    expect(result.sql).toBe("SELECT id FROM t ORDER BY id DESC OFFSET $1");
    expect(result.parameters.map((p) => p.value)).toEqual([5]);
  });

  test("DISTINCT is kept", () => {
    expect(compiled("SELECT DISTINCT band FROM obs").sql).toBe("SELECT DISTINCT band FROM obs");
  });

  test("compiles the same query to identical output twice", () => {
    const query = "SELECT TOP 3 source_id, mag FROM gaia.stars WHERE mag BETWEEN 10 AND 12 ORDER BY mag";
    expect(compiled(query)).toEqual(compiled(query));
  });
});

describe("Numeric Literals", () => {
  test("integers beyond 2^53 are bound exactly", () => {
    const result = compiled("SELECT ra FROM gaia.stars WHERE source_id = 5853498713190525696");
    expect(result.sql).toBe("SELECT ra FROM gaia.stars WHERE source_id = $1");
    expect(result.parameters).toEqual([{ index: 1, value: 5853498713190525696n, type: "bigint" }]);
  });

  test("the first unsafe integer keeps its last digit", () => {
    expect(compiled("SELECT ra FROM gaia.stars WHERE source_id = 9007199254740993").parameters).toEqual([
      { index: 1, value: 9007199254740993n, type: "bigint" },
    ]);
  });

  test("safe integers above the integer range are bigint numbers", () => {
    expect(compiled("SELECT ra FROM gaia.stars WHERE source_id = 4294967296").parameters).toEqual([
      { index: 1, value: 4294967296, type: "bigint" },
    ]);
  });

  test("doubles that overflow are rejected", () => {
    expect(failure("SELECT ra FROM gaia.stars WHERE 1.0E400 > ra")).toMatchObject({
      kind: "SyntaxError",
      message: "Number 1.0E400 is out of range",
      token: "1.0E400",
      position: { line: 1, column: 33, offset: 32 },
    });
  });

  test("TOP must fit a safe integer", () => {
    expect(failure("SELECT TOP 99999999999999999999 id FROM t").message).toBe(
      "TOP value 99999999999999999999 is too large"
    );
  });

  test("an exact integer is not an ORDER BY position", () => {
    expect(failure("SELECT id FROM t ORDER BY 99999999999999999999").message).toBe(
      "ORDER BY position 99999999999999999999 is not in the select list"
    );
  });
});

describe("Row Limits", () => {
  test("maxRows adds a LIMIT to an unlimited query", () => {
    const result = compiled("SELECT id FROM t", { maxRows: 100 });
    expect(result.sql).toBe("SELECT id FROM t LIMIT $1");
    expect(result.parameters.map((p) => p.value)).toEqual([100]);
  });

  test("maxRows caps a larger TOP", () => {
    expect(compiled("SELECT TOP 500 id FROM t", { maxRows: 100 }).parameters.map((p) => p.value)).toEqual([100]);
  });

  test("a smaller TOP wins over maxRows", () => {
    expect(compiled("SELECT TOP 10 id FROM t", { maxRows: 100 }).parameters.map((p) => p.value)).toEqual([10]);
  });

  test("maxRows applies only to the outermost query", () => {
    const result = compiled("SELECT x.n FROM (SELECT COUNT(*) AS n FROM obs) AS x", { maxRows: 7 });
    expect(result.sql).toBe("SELECT x.n FROM (SELECT COUNT(*) AS n FROM obs) AS x LIMIT $1");
  });

  test("maxRows limits a set operation as a whole", () => {
    const result = compiled("SELECT id FROM t UNION SELECT obs_id FROM obs ORDER BY 1", { maxRows: 50 });
    expect(result.sql).toBe("SELECT id FROM t UNION SELECT obs_id FROM obs ORDER BY 1 LIMIT $1");
    expect(result.parameters.map((p) => p.value)).toEqual([50]);
  });
});

describe("Joins and Scopes", () => {
  test("qualified columns through aliases", () => {
    const result = compiled(
      "SELECT s.source_id, o.flux FROM gaia.stars AS s JOIN obs AS o ON s.source_id = o.source_id WHERE o.flux > 1.5"
    );
    expect(result.sql).toBe(
      "SELECT s.source_id, o.flux FROM gaia.stars AS s JOIN obs AS o ON s.source_id = o.source_id WHERE o.flux > $1"
    );
    expect(result.parameters).toEqual([{ index: 1, value: 1.5, type: "double" }]);
    expect(result.outputColumns).toEqual([
      { name: "source_id", type: "bigint", unit: "", ucd: "meta.id;meta.main" },
      { name: "flux", type: "double", unit: "Jy", ucd: "phot.flux" },
    ]);
  });

  test("USING merges the join column", () => {
    expect(compiled("SELECT source_id, flux FROM gaia.stars JOIN obs USING (source_id)").sql).toBe(
      "SELECT source_id, flux FROM gaia.stars JOIN obs USING (source_id)"
    );
  });

  test("NATURAL join is emitted with an explicit USING list", () => {
    const result = compiled("SELECT * FROM t NATURAL JOIN obs");
    expect(result.sql).toBe(
      "SELECT t.id, t.ra, t.dec, obs.obs_id, obs.source_id, obs.flux, obs.band FROM t JOIN obs USING (ra, dec)"
    );
    expect(result.outputColumns.map((c) => c.name)).toEqual([
      "id",
      "ra",
      "dec",
      "obs_id",
      "source_id",
      "flux",
      "band",
    ]);
  });

  test("LEFT OUTER JOIN", () => {
    expect(compiled("SELECT t.id FROM t LEFT OUTER JOIN obs ON t.id = obs.obs_id").sql).toBe(
      "SELECT t.id FROM t LEFT JOIN obs ON t.id = obs.obs_id"
    );
  });

  test("correlated EXISTS subquery", () => {
    const result = compiled(
      "SELECT s.source_id FROM gaia.stars AS s WHERE EXISTS (SELECT o.obs_id FROM obs AS o WHERE o.source_id = s.source_id)"
    );
    expect(result.sql).toBe(
      "SELECT s.source_id FROM gaia.stars AS s WHERE EXISTS (SELECT o.obs_id FROM obs AS o WHERE o.source_id = s.source_id)"
    );
  });

  test("IN subquery", () => {
    expect(compiled("SELECT id FROM t WHERE id IN (SELECT obs_id FROM obs WHERE band = 'g')").sql).toBe(
      "SELECT id FROM t WHERE id IN (SELECT obs_id FROM obs WHERE band = $1)"
    );
  });
});

describe("Output Naming", () => {
  test("duplicate names get the position appended", () => {
    const result = compiled("SELECT s.ra, o.ra FROM gaia.stars AS s, obs AS o");
    expect(result.sql).toBe("SELECT s.ra, o.ra AS ra_2 FROM gaia.stars AS s, obs AS o");
    expect(result.outputColumns.map((c) => c.name)).toEqual(["ra", "ra_2"]);
  });

  test("computed columns are named expr_N", () => {
    const result = compiled("SELECT id, ra + dec FROM t");
    expect(result.sql).toBe("SELECT id, ra + dec AS expr_2 FROM t");
    expect(result.outputColumns[1]).toEqual({ name: "expr_2", type: "double", unit: "deg", ucd: "" });
  });

  test("aliases keep their case", () => {
    const result = compiled("SELECT ra AS RightAscension FROM t");
    expect(result.sql).toBe('SELECT ra AS "RightAscension" FROM t');
    expect(result.outputColumns[0]?.name).toBe("RightAscension");
  });

  test("case-sensitive and reserved names are quoted", () => {
    const result = compiled('SELECT "Value", "order" FROM "MixedCase"');
    expect(result.sql).toBe('SELECT "Value", "order" FROM "MixedCase"');
    expect(result.outputColumns.map((c) => c.name)).toEqual(["Value", "order"]);
  });
});

describe("Grouping and Ordering", () => {
  test("ORDER BY an alias becomes its position", () => {
    const result = compiled("SELECT band, COUNT(*) AS n FROM obs GROUP BY band ORDER BY n DESC");
    expect(result.sql).toBe("SELECT band, COUNT(*) AS n FROM obs GROUP BY band ORDER BY 2 DESC");
    expect(result.outputColumns).toEqual([
      { name: "band", type: "char", unit: "", ucd: "" },
      { name: "n", type: "bigint", unit: "", ucd: "meta.number" },
    ]);
  });

  test("GROUP BY a repeated select expression becomes its position", () => {
    expect(compiled("SELECT ROUND(mag) AS m, COUNT(*) AS n FROM gaia.stars GROUP BY ROUND(mag)").sql).toBe(
      "SELECT ROUND(mag) AS m, COUNT(*) AS n FROM gaia.stars GROUP BY 1"
    );
  });

  test("GROUP BY may name a select alias", () => {
    expect(compiled("SELECT ROUND(mag) AS m, COUNT(*) AS n FROM gaia.stars GROUP BY m").sql).toBe(
      "SELECT ROUND(mag) AS m, COUNT(*) AS n FROM gaia.stars GROUP BY 1"
    );
  });

  test("HAVING with an aggregate", () => {
    const result = compiled("SELECT band FROM obs GROUP BY band HAVING COUNT(*) > 10");
    expect(result.sql).toBe("SELECT band FROM obs GROUP BY band HAVING COUNT(*) > $1");
  });

  test("aggregate metadata", () => {
    const result = compiled("SELECT AVG(mag) AS mean_mag, MAX(mag) AS brightest FROM gaia.stars");
    expect(result.outputColumns).toEqual([
      { name: "mean_mag", type: "double", unit: "mag", ucd: "stat.mean;phot.mag" },
      { name: "brightest", type: "real", unit: "mag", ucd: "stat.max;phot.mag" },
    ]);
  });
});

describe("Long Conditions", () => {
  test("a thousand ORed comparisons compile", () => {
    const terms = Array.from({ length: 1000 }, (_, i) => `id = ${i}`);
    const result = compiled(`SELECT id FROM t WHERE ${terms.join(" OR ")}`);
    const expected = Array.from({ length: 1000 }, (_, i) => `id = $${i + 1}`);
    expect(result.sql).toBe(`SELECT id FROM t WHERE ${expected.join(" OR ")}`);
    expect(result.parameters).toHaveLength(1000);
    expect(result.parameters[999]).toEqual({ index: 1000, value: 999, type: "integer" });
  });

  test("a long sum of columns compiles", () => {
    const sum = Array.from({ length: 600 }, () => "ra").join(" + ");
    expect(compiled(`SELECT id FROM t WHERE ${sum} > 0`).sql).toBe(`SELECT id FROM t WHERE ${sum} > $1`);
  });

  test("parentheses inside a chain of the same operator are dropped", () => {
    expect(compiled("SELECT id FROM t WHERE ra > 1 OR (dec > 2 OR id > 3)").sql).toBe(
      "SELECT id FROM t WHERE ra > $1 OR dec > $2 OR id > $3"
    );
    expect(compiled("SELECT id FROM t WHERE ra > 1 AND (dec > 2 OR id > 3)").sql).toBe(
      "SELECT id FROM t WHERE ra > $1 AND (dec > $2 OR id > $3)"
    );
  });
});

describe("Set Operations", () => {
  test("UNION with an ORDER BY position", () => {
    const result = compiled("SELECT id FROM t UNION SELECT obs_id FROM obs ORDER BY 1");
    expect(result.sql).toBe("SELECT id FROM t UNION SELECT obs_id FROM obs ORDER BY 1");
    expect(result.outputColumns.map((c) => c.name)).toEqual(["id"]);
  });

  test("an operand with its own limit is parenthesized", () => {
    const result = compiled("(SELECT TOP 3 id FROM t ORDER BY id) UNION ALL SELECT obs_id FROM obs");
    expect(result.sql).toBe("(SELECT id FROM t ORDER BY id LIMIT $1) UNION ALL SELECT obs_id FROM obs");
    expect(result.parameters.map((p) => p.value)).toEqual([3]);
  });

  test("operands must return the same number of columns", () => {
    const error = failure("SELECT id, ra FROM t UNION SELECT obs_id FROM obs");
    expect(error.kind).toBe("TypeMismatchError");
    expect(error.message).toBe("UNION operands return 2 and 1 columns");
  });
});

describe("Geometry", () => {
  test("CONTAINS on spatially indexed columns uses q3c", () => {
    const result = compiled(
      "SELECT id FROM t WHERE CONTAINS(POINT('ICRS', ra, dec), CIRCLE('ICRS', 10, 20, 1)) = 1"
    );
    expect(result.sql).toBe("SELECT id FROM t WHERE q3c_radial_query(ra, dec, 10, 20, 1)");
    expect(result.parameters).toEqual([]);
  });

  test("CONTAINS against a BOX uses q3c_poly_query", () => {
    const result = compiled("SELECT id FROM t WHERE CONTAINS(POINT('ICRS', ra, dec), BOX('ICRS', 10, 20, 2, 4)) = 1");
    expect(result.sql).toBe("SELECT id FROM t WHERE q3c_poly_query(ra, dec, ARRAY[9, 18, 9, 22, 11, 22, 11, 18])");
  });

  test("CONTAINS against an STC-S REGION uses q3c", () => {
    const result = compiled("SELECT id FROM t WHERE CONTAINS(POINT('ICRS', ra, dec), REGION('Circle ICRS 10 20 1')) = 1");
    expect(result.sql).toBe("SELECT id FROM t WHERE q3c_radial_query(ra, dec, 10, 20, 1)");
  });

  test("without q3c, CONTAINS becomes the pgSphere operator", () => {
    const result = compiled("SELECT id FROM t WHERE CONTAINS(POINT('ICRS', ra, dec), BOX('ICRS', 10, 20, 2, 4)) = 1", {
      q3c: false,
    });
    expect(result.sql).toBe(
      "SELECT id FROM t WHERE (spoint(RADIANS(ra), RADIANS(dec)) @ '{(9d,18d),(9d,22d),(11d,22d),(11d,18d)}'::spoly)"
    );
  });

  test("columns outside the spatial index use pgSphere", () => {
    const result = compiled(
      "SELECT obs_id FROM obs WHERE 1 = CONTAINS(POINT('ICRS', ra, dec), CIRCLE('ICRS', 10, 20, 0.5))"
    );
    expect(result.sql).toBe(
      "SELECT obs_id FROM obs WHERE (spoint(RADIANS(ra), RADIANS(dec)) @ '<(10d,20d),0.5d>'::scircle)"
    );
  });

  test("CONTAINS = 0 is the negated predicate", () => {
    const result = compiled("SELECT obs_id FROM obs WHERE CONTAINS(POINT('ICRS', ra, dec), CIRCLE('ICRS', 10, 20, 1)) = 0");
    expect(result.sql).toBe(
      "SELECT obs_id FROM obs WHERE NOT (spoint(RADIANS(ra), RADIANS(dec)) @ '<(10d,20d),1d>'::scircle)"
    );
  });

  test("CONTAINS as a value is wrapped in CASE", () => {
    const result = compiled("SELECT CONTAINS(POINT('ICRS', ra, dec), CIRCLE('ICRS', 10, 20, 1)) AS inside FROM obs");
    expect(result.sql).toBe(
      "SELECT (CASE WHEN (spoint(RADIANS(ra), RADIANS(dec)) @ '<(10d,20d),1d>'::scircle) THEN 1 ELSE 0 END) AS inside FROM obs"
    );
    expect(result.outputColumns[0]).toEqual({ name: "inside", type: "integer", unit: "", ucd: "" });
  });

  test("comparing CONTAINS to anything but 0 or 1 is rejected", () => {
    const error = failure("SELECT id FROM t WHERE CONTAINS(POINT('ICRS', ra, dec), CIRCLE('ICRS', 10, 20, 1)) = 2");
    expect(error.kind).toBe("UnsupportedFeatureError");
  });

  test("DISTANCE between a column point and a literal point", () => {
    const result = compiled("SELECT DISTANCE(POINT('ICRS', ra, dec), POINT('ICRS', 10, 20)) AS d FROM t");
    expect(result.sql).toBe("SELECT DEGREES(spoint(RADIANS(ra), RADIANS(dec)) <-> '(10d,20d)'::spoint) AS d FROM t");
    expect(result.outputColumns[0]).toEqual({ name: "d", type: "double", unit: "deg", ucd: "pos.angDistance" });
  });

  test("COORD1 of a point constructor is its first argument", () => {
    expect(compiled("SELECT COORD1(POINT('ICRS', ra, dec)) AS c1 FROM t").sql).toBe("SELECT ra AS c1 FROM t");
  });

  test("COORD2 of a point column", () => {
    expect(compiled("SELECT COORD2(center) AS c2 FROM regions").sql).toBe(
      "SELECT DEGREES(lat(center)) AS c2 FROM regions"
    );
  });

  test("AREA is converted to square degrees", () => {
    const result = compiled("SELECT AREA(footprint) AS a FROM regions");
    expect(result.sql).toBe("SELECT DEGREES(DEGREES(AREA(footprint))) AS a FROM regions");
    expect(result.outputColumns[0]).toEqual({ name: "a", type: "double", unit: "deg**2", ucd: "phys.angArea" });
  });

  test("COORDSYS is the frame as a bound string", () => {
    const result = compiled("SELECT COORDSYS(POINT('ICRS', ra, dec)) AS cs FROM t");
    expect(result.sql).toBe("SELECT $1 AS cs FROM t");
    expect(result.parameters).toEqual([{ index: 1, value: "ICRS", type: "varchar" }]);
  });

  test("shapes in another frame are transformed in SQL", () => {
    const result = compiled("SELECT region_id FROM regions WHERE CONTAINS(center, area_circle) = 1");
    expect(result.sql).toBe(
      "SELECT region_id FROM regions WHERE (center @ (area_circle - strans(1.3463560974407338, -1.0973190018372752, 0.5747705247287326)))"
    );
  });

  test("polygons need constant vertices", () => {
    const error = failure("SELECT id FROM t WHERE CONTAINS(POINT('ICRS', 1, 2), POLYGON('ICRS', ra, dec, 1, 2, 3, 4)) = 1");
    expect(error.kind).toBe("UnsupportedFeatureError");
  });
});

describe("Functions", () => {
  test("ROUND with digits uses a template", () => {
    const result = compiled("SELECT ROUND(mag, 2) FROM gaia.stars");
    expect(result.sql).toBe("SELECT ROUND(CAST(mag AS NUMERIC), $1) AS expr_1 FROM gaia.stars");
    expect(result.parameters).toEqual([{ index: 1, value: 2, type: "integer" }]);
  });

  test("functions are renamed for the backend", () => {
    expect(compiled("SELECT LOG10(flux) AS l, CEILING(flux) AS c FROM obs").sql).toBe(
      "SELECT LOG(flux) AS l, CEIL(flux) AS c FROM obs"
    );
  });

  test("backend string functions", () => {
    expect(compiled("SELECT source_id FROM gaia.stars WHERE ivo_nocasecmp(name, 'vega') = 1").sql).toBe(
      "SELECT source_id FROM gaia.stars WHERE (CASE WHEN LOWER(name) = LOWER($1) THEN 1 ELSE 0 END) = $2"
    );
  });

  test("RAND with a seed is unsupported", () => {
    expect(failure("SELECT RAND(1) AS r FROM t").kind).toBe("UnsupportedFeatureError");
  });
});

describe("Errors", () => {
  test("syntax errors carry a position", () => {
    const error = failure("SELECT FROM t");
    expect(error.kind).toBe("SyntaxError");
    expect(error.position).toEqual({ line: 1, column: 8, offset: 7 });
    expect(error.token).toBe("FROM");
  });

  test("error offsets count UTF-8 bytes", () => {
    expect(failure("SELECT 'Å' AS a, nope FROM t").position).toEqual({ line: 1, column: 18, offset: 18 });
  });

  test("unknown table", () => {
    const error = failure("SELECT x FROM nowhere");
    expect(error.kind).toBe("UnknownTableError");
    expect(error.token).toBe("nowhere");
  });

  test("unknown column", () => {
    const error = failure("SELECT nope FROM t");
    expect(error).toMatchObject({ kind: "UnknownColumnError", message: "Unknown column nope", token: "nope" });
    expect(error.position).toEqual({ line: 1, column: 8, offset: 7 });
  });

  test("ambiguous column", () => {
    const error = failure("SELECT source_id FROM gaia.stars AS s JOIN obs AS o ON s.source_id = o.source_id");
    expect(error.kind).toBe("AmbiguousColumnError");
    expect(error.message).toBe("Column source_id is ambiguous (found in s, o)");
  });

  test("unknown function", () => {
    expect(failure("SELECT foo(ra) FROM t").kind).toBe("UnsupportedFunctionError");
  });

  test("wrong number of arguments", () => {
    const error = failure("SELECT ABS(ra, dec) FROM t");
    expect(error.kind).toBe("ArityMismatchError");
    expect(error.message).toBe("ABS takes 1 argument(s), got 2");
  });

  test("incomparable types", () => {
    const error = failure("SELECT id FROM t WHERE ra = 'abc'");
    expect(error.kind).toBe("TypeMismatchError");
    expect(error.message).toBe("Cannot compare double with varchar using =");
  });

  test("ungrouped column", () => {
    const error = failure("SELECT band, flux FROM obs GROUP BY band");
    expect(error.kind).toBe("TypeMismatchError");
    expect(error.message).toBe("Column flux must appear in GROUP BY or be used in an aggregate function");
  });

  test("aggregate in WHERE", () => {
    expect(failure("SELECT id FROM t WHERE COUNT(*) > 1").kind).toBe("TypeMismatchError");
  });

  test("deep nesting stops at the configured limit", () => {
    const error = failure("SELECT ((((1)))) AS x FROM t", { maxNesting: 3 });
    expect(error.kind).toBe("RecursionLimitError");
  });

  test("compileOrThrow throws the structured error", () => {
    expect(() => compileOrThrow("SELECT nope FROM t", { catalog })).toThrow(CompilationFailedError);
    try {
      compileOrThrow("SELECT nope FROM t", { catalog });
    } catch (error) {
      expect(error).toBeInstanceOf(CompilationFailedError);
      if (error instanceof CompilationFailedError) {
        expect(error.error.kind).toBe("UnknownColumnError");
        expect(error.message).toBe("UnknownColumnError [1:8]: Unknown column nope");
      }
    }
  });
});

describe("Logging", () => {
  test("logs stage durations for enabled categories", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "debug", categories: ["parser", "emitter"], write: (line) => lines.push(line) });
    const result = compile("SELECT id FROM t", { catalog, logger });

    expect(result.success).toBe(true);
    expect(lines.some((line) => line.includes("[DEBUG] [adql:parser] parse done"))).toBe(true);
    expect(lines.some((line) => line.includes("[DEBUG] [adql:emitter] emit done"))).toBe(true);
    expect(lines.some((line) => line.includes("[adql:annotator]"))).toBe(false);
  });

  test("is silent at the default level", () => {
    const lines: string[] = [];
    compileQuery("SELECT nope FROM t", { logger: createLogger({ write: (line) => lines.push(line) }) });
    expect(lines).toEqual([]);
  });
});
