/**
 * Lexer and Parser Tests
 */

import { describe, test, expect } from "vitest";
import { tokenize, toToken } from "../src/lexer.ts";
import { parse } from "../src/parser.ts";
import { QuerySyntaxError, RecursionLimitError } from "../src/errors.ts";
import type { Query, QueryExpression } from "../src/types.ts";

function query(source: string): Query {
  const tree = parse(source);
  if (tree.type !== "Query") {
    throw new Error(`Expected a single query, got ${tree.type}`);
  }
  return tree;
}

function syntaxError(source: string): QuerySyntaxError {
  try {
    parse(source);
  } catch (error) {
    if (error instanceof QuerySyntaxError) return error;
    throw error;
  }
  throw new Error(`Expected ${source} to be rejected`);
}

function lex(source: string) {
  return tokenize(source).tokens.map((token) => toToken(token, source));
}

describe("Lexer", () => {
  test("classifies tokens", () => {
    const tokens = lex("SELECT ra FROM t WHERE ra >= 1.5");
    expect(tokens.map((t) => [t.kind, t.lexeme])).toEqual([
      ["keyword", "SELECT"],
      ["identifier", "ra"],
      ["keyword", "FROM"],
      ["identifier", "t"],
      ["keyword", "WHERE"],
      ["identifier", "ra"],
      ["operator", ">="],
      ["literal", "1.5"],
    ]);
  });

  test("keywords are case-insensitive but prefixes are identifiers", () => {
    const tokens = lex("select selection fromage");
    expect(tokens.map((t) => t.kind)).toEqual(["keyword", "identifier", "identifier"]);
  });

  test("skips comments", () => {
    const tokens = lex("SELECT -- the id\n id /* all of them */ FROM t");
    expect(tokens.map((t) => t.lexeme)).toEqual(["SELECT", "id", "FROM", "t"]);
  });

  test("records positions", () => {
    const [, second] = lex("SELECT\n  ra FROM t");
    expect(second?.position).toEqual({ line: 2, column: 3, offset: 9 });
  });

  test("offsets count UTF-8 bytes", () => {
    const [, literal, as] = lex("SELECT 'Å' AS a FROM t");
    expect(literal?.position.offset).toBe(7);
    expect(as?.position).toEqual({ line: 1, column: 12, offset: 12 });
  });
});

describe("Select Statements", () => {
  test("parses TOP, DISTINCT and the select list", () => {
    const tree = query("SELECT DISTINCT TOP 10 ra, dec AS d FROM t");
    expect(tree.distinct).toBe(true);
    expect(tree.top).toBe(10);
    expect(tree.select.items).toHaveLength(2);
    expect(tree.select.items[1]).toMatchObject({ type: "SelectItem", alias: { name: "d", quoted: false } });
  });

  test("parses * and qualified *", () => {
    expect(query("SELECT * FROM t").select.items[0]?.type).toBe("SelectStar");
    expect(query("SELECT s.* FROM gaia.stars AS s").select.items[0]).toMatchObject({
      type: "SelectStar",
      qualifier: [{ name: "s", quoted: false }],
    });
  });

  test("parses qualified table names and delimited identifiers", () => {
    const tree = query('SELECT "Value" FROM gaia."Stars" s');
    expect(tree.from[0]).toMatchObject({
      type: "TableRef",
      name: [
        { name: "gaia", quoted: false },
        { name: "Stars", quoted: true },
      ],
      alias: { name: "s", quoted: false },
    });
    expect(tree.select.items[0]).toMatchObject({ expr: { type: "ColumnRef", name: { name: "Value", quoted: true } } });
  });

  test("parses every clause", () => {
    const tree = query(
      "SELECT band, COUNT(*) FROM obs WHERE flux > 0 GROUP BY band HAVING COUNT(*) > 1 ORDER BY band DESC OFFSET 3"
    );
    expect(tree.where?.type).toBe("Comparison");
    expect(tree.groupBy).toHaveLength(1);
    expect(tree.having?.type).toBe("Comparison");
    expect(tree.orderBy).toMatchObject([{ type: "OrderItem", descending: true }]);
    expect(tree.offset).toBe(3);
  });

  test("rejects a fractional TOP", () => {
    expect(syntaxError("SELECT TOP 1.5 ra FROM t").message).toBe("TOP expects an unsigned integer, found '1.5'");
  });

  test("requires an alias on a FROM subquery", () => {
    expect(syntaxError("SELECT n FROM (SELECT id AS n FROM t)").message).toBe("A subquery in FROM needs an alias");
  });
});

describe("Expressions", () => {
  function where(source: string) {
    const tree = query(`SELECT id FROM t WHERE ${source}`);
    if (!tree.where) throw new Error("no WHERE clause");
    return tree.where;
  }

  test("long OR chains fold into a balanced tree", () => {
    expect(where("a = 1 OR b = 2 OR c = 3 OR d = 4")).toMatchObject({
      op: "OR",
      left: { op: "OR", left: { left: { name: { name: "a" } } }, right: { left: { name: { name: "b" } } } },
      right: { op: "OR", left: { left: { name: { name: "c" } } }, right: { left: { name: { name: "d" } } } },
    });
  });

  test("AND binds tighter than OR", () => {
    expect(where("a = 1 OR b = 2 AND c = 3")).toMatchObject({
      type: "BinaryExpr",
      op: "OR",
      right: { type: "BinaryExpr", op: "AND" },
    });
  });

  test("* binds tighter than +", () => {
    const tree = query("SELECT 1 + 2 * 3 AS x FROM t");
    expect(tree.select.items[0]).toMatchObject({
      expr: { type: "BinaryExpr", op: "+", right: { type: "BinaryExpr", op: "*" } },
    });
  });

  test("arithmetic is left-associative", () => {
    const tree = query("SELECT ra - dec - 1 AS x FROM t");
    expect(tree.select.items[0]).toMatchObject({
      expr: { type: "BinaryExpr", op: "-", left: { type: "BinaryExpr", op: "-" }, right: { type: "Literal" } },
    });
  });

  test("!= is the same as <>", () => {
    expect(where("ra != 1")).toMatchObject({ type: "Comparison", op: "<>" });
  });

  test("negated predicates", () => {
    expect(where("ra NOT BETWEEN 1 AND 2")).toMatchObject({ type: "Between", negated: true });
    expect(where("band NOT IN ('g', 'r')")).toMatchObject({ type: "InList", negated: true, values: [{}, {}] });
    expect(where("name NOT ILIKE 'a%'")).toMatchObject({ type: "LikePattern", negated: true, caseInsensitive: true });
    expect(where("name IS NOT NULL")).toMatchObject({ type: "NullCheck", negated: true });
  });

  test("literals", () => {
    expect(where("a = 42")).toMatchObject({ right: { type: "Literal", kind: "integer", value: 42 } });
    expect(where("a = 1.5e2")).toMatchObject({ right: { type: "Literal", kind: "double", value: 150 } });
    expect(where("a = 'it''s'")).toMatchObject({ right: { type: "Literal", kind: "string", value: "it's" } });
    expect(where("a = TRUE")).toMatchObject({ right: { type: "Literal", kind: "boolean", value: true } });
  });

  test("unary minus", () => {
    expect(where("a = -5")).toMatchObject({ right: { type: "UnaryExpr", op: "-", operand: { value: 5 } } });
  });

  test("function calls", () => {
    const tree = query("SELECT COUNT(DISTINCT band) AS n, COUNT(*) AS m FROM obs");
    expect(tree.select.items[0]).toMatchObject({
      expr: { type: "FunctionCall", name: "COUNT", quantifier: "DISTINCT", star: false },
    });
    expect(tree.select.items[1]).toMatchObject({ expr: { type: "FunctionCall", name: "COUNT", star: true, args: [] } });
  });

  test("geometry constructors take their frame from the first argument", () => {
    expect(where("CONTAINS(POINT('ICRS', ra, dec), CIRCLE('GALACTIC', 1, 2, 3)) = 1")).toMatchObject({
      type: "Comparison",
      left: {
        type: "FunctionCall",
        name: "CONTAINS",
        args: [
          { type: "GeometryLiteral", shape: "POINT", coordSys: "ICRS", args: [{}, {}] },
          { type: "GeometryLiteral", shape: "CIRCLE", coordSys: "GALACTIC", args: [{}, {}, {}] },
        ],
      },
    });
  });

  test("REGION keeps its string argument", () => {
    expect(where("CONTAINS(POINT(ra, dec), REGION('Circle ICRS 1 2 3')) = 1")).toMatchObject({
      left: {
        args: [
          { shape: "POINT", args: [{}, {}] },
          { shape: "REGION", args: [{ type: "Literal", value: "Circle ICRS 1 2 3" }] },
        ],
      },
    });
  });

  test("EXISTS and IN subqueries", () => {
    expect(where("EXISTS (SELECT obs_id FROM obs)")).toMatchObject({ type: "Exists", subquery: { type: "Query" } });
    expect(where("id IN (SELECT obs_id FROM obs)")).toMatchObject({ type: "InList", subquery: { type: "Query" } });
  });
});

describe("Joins", () => {
  test("join kinds", () => {
    expect(query("SELECT * FROM t LEFT OUTER JOIN obs ON t.id = obs.obs_id").from[0]).toMatchObject({
      type: "Join",
      kind: "LEFT",
      natural: false,
      on: { type: "Comparison" },
    });
    expect(query("SELECT * FROM t CROSS JOIN obs").from[0]).toMatchObject({ kind: "CROSS" });
    expect(query("SELECT * FROM t NATURAL JOIN obs").from[0]).toMatchObject({ kind: "INNER", natural: true });
    expect(query("SELECT * FROM t JOIN obs USING (ra, dec)").from[0]).toMatchObject({
      using: [
        { name: "ra", quoted: false },
        { name: "dec", quoted: false },
      ],
    });
  });

  test("joins chain to the left", () => {
    expect(query("SELECT * FROM t JOIN obs USING (ra) JOIN regions ON 1 = 1").from[0]).toMatchObject({
      type: "Join",
      left: { type: "Join", left: { type: "TableRef" }, right: { type: "TableRef" } },
      right: { type: "TableRef" },
    });
  });

  test("a join needs a condition", () => {
    expect(syntaxError("SELECT * FROM t JOIN obs").message).toBe("JOIN requires ON or USING");
  });

  test("NATURAL joins take no condition", () => {
    expect(syntaxError("SELECT * FROM t NATURAL JOIN obs USING (ra)").message).toBe(
      "A NATURAL join takes neither ON nor USING"
    );
  });
});

describe("Set Operations", () => {
  function setOp(source: string): QueryExpression {
    return parse(source);
  }

  test("UNION and EXCEPT are left-associative", () => {
    expect(setOp("SELECT id FROM t UNION SELECT id FROM t EXCEPT SELECT id FROM t")).toMatchObject({
      type: "SetOp",
      op: "EXCEPT",
      left: { type: "SetOp", op: "UNION" },
    });
  });

  test("INTERSECT binds tighter than UNION", () => {
    expect(setOp("SELECT id FROM t UNION ALL SELECT id FROM t INTERSECT SELECT id FROM t")).toMatchObject({
      type: "SetOp",
      op: "UNION",
      all: true,
      right: { type: "SetOp", op: "INTERSECT", all: false },
    });
  });

  test("trailing ORDER BY belongs to the set operation", () => {
    const tree = setOp("SELECT id FROM t UNION SELECT id FROM t ORDER BY 1");
    expect(tree).toMatchObject({ type: "SetOp", orderBy: [{ expr: { type: "Literal", value: 1 } }] });
    if (tree.type === "SetOp") {
      expect(tree.right).toMatchObject({ type: "Query", orderBy: [] });
    }
  });
});

describe("Errors", () => {
  test("reports the unexpected token and its position", () => {
    const error = syntaxError("SELECT FROM t");
    expect(error.kind).toBe("SyntaxError");
    expect(error.token).toBe("FROM");
    expect(error.position).toEqual({ line: 1, column: 8, offset: 7 });
    expect(error.message.startsWith("Unexpected 'FROM'; expected one of ")).toBe(true);
  });

  test("reports the end of input", () => {
    const error = syntaxError("SELECT ra FROM");
    expect(error.message.startsWith("Unexpected end of input")).toBe(true);
    expect(error.position).toEqual({ line: 1, column: 15, offset: 14 });
  });

  test("reports unknown characters", () => {
    const error = syntaxError("SELECT ra FROM t WHERE ra # 1");
    expect(error.message).toBe("Unexpected character '#'");
    expect(error.position).toEqual({ line: 1, column: 27, offset: 26 });
  });

  test("rejects a second ORDER BY", () => {
    expect(syntaxError("(SELECT id FROM t ORDER BY id) ORDER BY id").message).toBe(
      "ORDER BY and OFFSET may only be given once per query"
    );
  });

  test("limits parenthesis nesting", () => {
    expect(() => parse("SELECT ((((1)))) AS x FROM t", { maxNesting: 3 })).toThrow(RecursionLimitError);
    expect(parse("SELECT ((((1)))) AS x FROM t", { maxNesting: 4 }).type).toBe("Query");
  });
});
