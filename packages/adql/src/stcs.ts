/**
 * STC-S subset for REGION arguments: `Position`, `Circle`, `Box` and
 * `Polygon`, each with optional frame, reference position and flavor words
 * before the coordinates, e.g. `Circle ICRS GEOCENTER 10 20 1`.
 */

import type { GeometryShape } from "./types.ts";

export interface StcsShape {
  shape: Exclude<GeometryShape, "REGION">;
  /** First frame word as written, or `''` */
  frame: string;
  values: number[];
}

const SHAPES: Readonly<Record<string, StcsShape["shape"]>> = {
  POSITION: "POINT",
  CIRCLE: "CIRCLE",
  BOX: "BOX",
  POLYGON: "POLYGON",
};

const NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

function arityValid(shape: StcsShape["shape"], count: number): boolean {
  switch (shape) {
    case "POINT":
      return count === 2;
    case "CIRCLE":
      return count === 3;
    case "BOX":
      return count === 4;
    case "POLYGON":
      return count >= 6 && count % 2 === 0;
  }
}

/** Parse `source`, or return undefined for anything outside the subset. */
export function parseStcs(source: string): StcsShape | undefined {
  const words = source.trim().split(/\s+/).filter((word) => word.length > 0);
  const [head, ...rest] = words;
  if (head === undefined) return undefined;

  const shape = SHAPES[head.toUpperCase()];
  if (!shape) return undefined;

  const qualifiers: string[] = [];
  let index = 0;
  for (; index < rest.length; index++) {
    const word = rest[index] ?? "";
    if (NUMBER.test(word)) break;
    qualifiers.push(word);
  }

  const numbers = rest.slice(index);
  if (!numbers.every((word) => NUMBER.test(word))) return undefined;

  const values = numbers.map(Number);
  if (!arityValid(shape, values.length)) return undefined;

  return { shape, frame: qualifiers[0] ?? "", values };
}
