/**
 * Coordinate Frames and STC-S Tests
 */

import { describe, test, expect } from "vitest";
import {
  CoordinateConversions,
  createDefaultConversions,
  framesCompatible,
  normalizeFrame,
} from "../src/coordsys.ts";
import { parseStcs } from "../src/stcs.ts";
import { compiled, failure } from "./helpers.ts";

describe("Frame Tags", () => {
  test("normalizes case, aliases and trailing words", () => {
    expect(normalizeFrame("icrs")).toBe("ICRS");
    expect(normalizeFrame("ICRS GEOCENTER")).toBe("ICRS");
    expect(normalizeFrame("J2000")).toBe("FK5");
    expect(normalizeFrame("b1950")).toBe("FK4");
    expect(normalizeFrame("GALACTIC_II")).toBe("GALACTIC");
    expect(normalizeFrame(undefined)).toBe("");
  });

  test("unknown frames are compatible with everything", () => {
    expect(framesCompatible("", "GALACTIC")).toBe(true);
    expect(framesCompatible("UNKNOWN", "ICRS")).toBe(true);
    expect(framesCompatible("ICRS", "icrs")).toBe(true);
    expect(framesCompatible("ICRS", "GALACTIC")).toBe(false);
  });
});

describe("CoordinateConversions", () => {
  const conversions = createDefaultConversions();

  test("the galactic north pole", () => {
    const pole = conversions.convert("ICRS", "GALACTIC", { lon: 192.85948, lat: 27.12825 });
    expect(pole?.lat).toBeCloseTo(90, 2);
  });

  test("the galactic center", () => {
    const center = conversions.convert("GALACTIC", "ICRS", { lon: 0, lat: 0 });
    expect(center?.lon).toBeCloseTo(266.405, 2);
    expect(center?.lat).toBeCloseTo(-28.936, 2);
  });

  test("round trips", () => {
    const start = { lon: 10, lat: 20 };
    const there = conversions.convert("ICRS", "GALACTIC", start);
    const back = there && conversions.convert("GALACTIC", "ICRS", there);
    expect(back?.lon).toBeCloseTo(10, 9);
    expect(back?.lat).toBeCloseTo(20, 9);
  });

  test("FK5 and ICRS share axes", () => {
    expect(conversions.convert("ICRS", "FK5", { lon: 1, lat: 2 })).toEqual({ lon: 1, lat: 2 });
    expect(conversions.sqlTransform("ICRS", "FK5")).toBe("");
  });

  test("FK4 is only converted in SQL", () => {
    expect(conversions.convert("ICRS", "FK4", { lon: 1, lat: 2 })).toBeUndefined();
    expect(conversions.sqlTransform("FK4", "ICRS")).toBe(
      "- strans(1.5651864333666516, -0.0048590552804904244, -1.5763681043529187)"
    );
  });

  test("unregistered frames cannot be converted", () => {
    expect(conversions.hasFrame("ECLIPTIC")).toBe(false);
    expect(conversions.convert("ICRS", "ECLIPTIC", { lon: 1, lat: 2 })).toBeUndefined();
    expect(conversions.sqlTransform("ICRS", "ECLIPTIC")).toBeUndefined();
  });

  test("direct converters take precedence", () => {
    const custom = new CoordinateConversions().register("ICRS", "ECLIPTIC", (p) => ({ lon: p.lon + 1, lat: p.lat }));
    expect(custom.convert("ICRS", "ECLIPTIC", { lon: 1, lat: 2 })).toEqual({ lon: 2, lat: 2 });
  });
});

describe("STC-S", () => {
  test("parses the supported shapes", () => {
    expect(parseStcs("Circle ICRS 10 20 1")).toEqual({ shape: "CIRCLE", frame: "ICRS", values: [10, 20, 1] });
    expect(parseStcs("Position GALACTIC 1.5 -2")).toEqual({ shape: "POINT", frame: "GALACTIC", values: [1.5, -2] });
    expect(parseStcs("box 1 2 3 4")).toEqual({ shape: "BOX", frame: "", values: [1, 2, 3, 4] });
    expect(parseStcs("Polygon FK5 GEOCENTER 0 0 1 0 1 1")).toEqual({
      shape: "POLYGON",
      frame: "FK5",
      values: [0, 0, 1, 0, 1, 1],
    });
  });

  test("rejects anything else", () => {
    expect(parseStcs("")).toBeUndefined();
    expect(parseStcs("Ellipse ICRS 1 2 3 4 5")).toBeUndefined();
    expect(parseStcs("Circle ICRS 1 2")).toBeUndefined();
    expect(parseStcs("Circle ICRS 1 2 x")).toBeUndefined();
    expect(parseStcs("Polygon 0 0 1 0 1")).toBeUndefined();
  });
});

describe("Geometry in Queries", () => {
  test("literal shapes are converted into the point's frame", () => {
    const result = compiled(
      "SELECT id FROM t WHERE CONTAINS(POINT('ICRS', ra, dec), CIRCLE('GALACTIC', 0, 90, 1)) = 1",
      { q3c: false }
    );
    expect(result.sql).toMatch(
      /^SELECT id FROM t WHERE \(spoint\(RADIANS\(ra\), RADIANS\(dec\)\) @ '<\(192\.85\d*d,27\.12\d*d\),1d>'::scircle\)$/
    );
  });

  test("q3c sees the converted circle", () => {
    const result = compiled("SELECT id FROM t WHERE CONTAINS(POINT('ICRS', ra, dec), CIRCLE('GALACTIC', 0, 90, 1)) = 1");
    expect(result.sql).toMatch(/^SELECT id FROM t WHERE q3c_radial_query\(ra, dec, 192\.85\d*, 27\.12\d*, 1\)$/);
  });

  test("FK4 literals need a SQL transform", () => {
    const result = compiled("SELECT id FROM t WHERE CONTAINS(POINT('ICRS', ra, dec), CIRCLE('FK4', 1, 2, 3)) = 1");
    expect(result.sql).toBe(
      "SELECT id FROM t WHERE (spoint(RADIANS(ra), RADIANS(dec)) @ ('<(1d,2d),3d>'::scircle - strans(1.5651864333666516, -0.0048590552804904244, -1.5763681043529187)))"
    );
  });

  test("unknown frames are not converted", () => {
    expect(failure("SELECT id FROM t WHERE CONTAINS(POINT('ICRS', ra, dec), CIRCLE('ECLIPTIC', 1, 2, 3)) = 1")).toMatchObject({
      kind: "UnsupportedFeatureError",
      message: "No conversion from ECLIPTIC to ICRS is available",
    });
  });

  test("INTERSECTS with a point is CONTAINS", () => {
    expect(compiled("SELECT id FROM t WHERE INTERSECTS(CIRCLE('ICRS', 10, 20, 1), POINT('ICRS', ra, dec)) = 1").sql).toBe(
      "SELECT id FROM t WHERE q3c_radial_query(ra, dec, 10, 20, 1)"
    );
  });

  test("INTERSECTS of two shapes is the overlap operator", () => {
    expect(compiled("SELECT region_id FROM regions WHERE INTERSECTS(footprint, CIRCLE('ICRS', 1, 2, 3)) = 1").sql).toBe(
      "SELECT region_id FROM regions WHERE (footprint && '<(1d,2d),3d>'::scircle)"
    );
  });

  test("a point with computed coordinates is built in SQL", () => {
    expect(compiled("SELECT DISTANCE(POINT('ICRS', ra + 1, dec), POINT('ICRS', 0, 0)) AS d FROM obs").sql).toBe(
      "SELECT DEGREES(spoint(RADIANS(ra + $1), RADIANS(dec)) <-> '(0d,0d)'::spoint) AS d FROM obs"
    );
  });

  test("DISTANCE of four numbers", () => {
    expect(compiled("SELECT DISTANCE(ra, dec, 10, 20) AS d FROM obs").sql).toBe(
      "SELECT DEGREES(spoint(RADIANS(ra), RADIANS(dec)) <-> '(10d,20d)'::spoint) AS d FROM obs"
    );
  });

  test("CENTROID of a circle", () => {
    expect(compiled("SELECT CENTROID(area_circle) AS c FROM regions").sql).toBe(
      "SELECT @@(area_circle) AS c FROM regions"
    );
  });

  test("CENTROID of a polygon is unsupported", () => {
    expect(failure("SELECT CENTROID(footprint) AS c FROM regions").kind).toBe("UnsupportedFeatureError");
  });

  test("COORDSYS of a shape without a frame", () => {
    expect(compiled("SELECT COORDSYS(POINT(ra, dec)) AS cs FROM t").parameters).toEqual([
      { index: 1, value: "UNKNOWN", type: "varchar" },
    ]);
  });
});
