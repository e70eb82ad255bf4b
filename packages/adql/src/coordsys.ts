/**
 * Coordinate Conversions
 *
 * Frames are registered relative to ICRS: a rotation matrix converts literal
 * positions at compile time, pgSphere Euler angles (`strans`) convert column
 * expressions in SQL. Either may be missing; the morpher reports what it
 * cannot convert.
 */

export interface SkyPoint {
  /** Longitude in degrees, [0, 360) */
  lon: number;
  /** Latitude in degrees */
  lat: number;
}

export type PointConverter = (point: SkyPoint) => SkyPoint;

type Matrix3 = readonly [
  readonly [number, number, number],
  readonly [number, number, number],
  readonly [number, number, number],
];

type EulerAngles = readonly [number, number, number];

export interface FrameDefinition {
  /** Rotation taking ICRS unit vectors into this frame */
  matrix?: Matrix3;
  /** pgSphere `strans` angles (radians) taking ICRS into this frame */
  euler?: EulerAngles;
  /** Same axes as ICRS to the precision handled here */
  identity?: boolean;
}

// ============================================================================
// Frame Tags
// ============================================================================

const FRAME_ALIASES: Readonly<Record<string, string>> = {
  GALACTIC_II: "GALACTIC",
  J2000: "FK5",
  B1950: "FK4",
};

const UNIVERSAL_FRAMES = new Set(["", "UNKNOWN", "RELOCATABLE"]);

/** `'ICRS GEOCENTER'` → `ICRS`; absent tags normalize to `''`. */
export function normalizeFrame(tag: string | undefined): string {
  const word = (tag ?? "").trim().split(/\s+/)[0] ?? "";
  const upper = word.toUpperCase();
  return FRAME_ALIASES[upper] ?? upper;
}

export function isUniversalFrame(tag: string | undefined): boolean {
  return UNIVERSAL_FRAMES.has(normalizeFrame(tag));
}

/** True when no conversion is needed between the two tags. */
export function framesCompatible(a: string | undefined, b: string | undefined): boolean {
  if (isUniversalFrame(a) || isUniversalFrame(b)) return true;
  return normalizeFrame(a) === normalizeFrame(b);
}

// ============================================================================
// Vector Helpers
// ============================================================================

const DEG = Math.PI / 180;

function toVector(point: SkyPoint): [number, number, number] {
  const lon = point.lon * DEG;
  const lat = point.lat * DEG;
  return [Math.cos(lat) * Math.cos(lon), Math.cos(lat) * Math.sin(lon), Math.sin(lat)];
}

function fromVector([x, y, z]: readonly [number, number, number]): SkyPoint {
  const lat = Math.atan2(z, Math.hypot(x, y)) / DEG;
  let lon = Math.atan2(y, x) / DEG;
  if (lon < 0) lon += 360;
  return { lon, lat };
}

function multiply(matrix: Matrix3, v: readonly [number, number, number]): [number, number, number] {
  return [
    matrix[0][0] * v[0] + matrix[0][1] * v[1] + matrix[0][2] * v[2],
    matrix[1][0] * v[0] + matrix[1][1] * v[1] + matrix[1][2] * v[2],
    matrix[2][0] * v[0] + matrix[2][1] * v[1] + matrix[2][2] * v[2],
  ];
}

function transpose(m: Matrix3): Matrix3 {
  return [
    [m[0][0], m[1][0], m[2][0]],
    [m[0][1], m[1][1], m[2][1]],
    [m[0][2], m[1][2], m[2][2]],
  ];
}

function formatEuler(angles: EulerAngles): string {
  return `strans(${angles.join(", ")})`;
}

// ============================================================================
// Registry
// ============================================================================

export class CoordinateConversions {
  private readonly frames = new Map<string, FrameDefinition>();
  private readonly converters = new Map<string, PointConverter>();

  registerFrame(name: string, definition: FrameDefinition): this {
    this.frames.set(normalizeFrame(name), definition);
    return this;
  }

  /** A direct converter, preferred over the frames' matrices. */
  register(from: string, to: string, converter: PointConverter): this {
    this.converters.set(`${normalizeFrame(from)}>${normalizeFrame(to)}`, converter);
    return this;
  }

  hasFrame(name: string): boolean {
    return this.frames.has(normalizeFrame(name));
  }

  convert(from: string, to: string, point: SkyPoint): SkyPoint | undefined {
    if (framesCompatible(from, to)) return point;

    const direct = this.converters.get(`${normalizeFrame(from)}>${normalizeFrame(to)}`);
    if (direct) return direct(point);

    const source = this.frames.get(normalizeFrame(from));
    const target = this.frames.get(normalizeFrame(to));
    if (!source || !target) return undefined;

    let vector = toVector(point);
    if (!source.identity) {
      if (!source.matrix) return undefined;
      vector = multiply(transpose(source.matrix), vector);
    }
    if (!target.identity) {
      if (!target.matrix) return undefined;
      vector = multiply(target.matrix, vector);
    }
    return fromVector(vector);
  }

  /**
   * The pgSphere operator suffix converting a `from` expression into `to`,
   * e.g. `+ strans(...)`. Empty when the frames share axes.
   */
  sqlTransform(from: string, to: string): string | undefined {
    if (framesCompatible(from, to)) return "";

    const source = this.frames.get(normalizeFrame(from));
    const target = this.frames.get(normalizeFrame(to));
    if (!source || !target) return undefined;

    const parts: string[] = [];
    if (!source.identity) {
      if (!source.euler) return undefined;
      parts.push(`- ${formatEuler(source.euler)}`);
    }
    if (!target.identity) {
      if (!target.euler) return undefined;
      parts.push(`+ ${formatEuler(target.euler)}`);
    }
    return parts.join(" ");
  }
}

// ============================================================================
// Defaults
// ============================================================================

export const ICRS_TO_GALACTIC: Matrix3 = [
  [-0.0548755604162154, -0.873437090234885, -0.4838350155487132],
  [0.4941094278755837, -0.4448296299600112, 0.7469822444972189],
  [-0.8676661490190047, -0.1980763734312015, 0.4559837761750669],
];

export function createDefaultConversions(): CoordinateConversions {
  return new CoordinateConversions()
    .registerFrame("ICRS", { identity: true })
    .registerFrame("FK5", { identity: true })
    .registerFrame("GALACTIC", {
      matrix: ICRS_TO_GALACTIC,
      euler: [1.3463560974407338, -1.0973190018372752, 0.5747705247287326],
    })
    .registerFrame("FK4", {
      euler: [1.5651864333666516, -0.0048590552804904244, -1.5763681043529187],
    });
}
