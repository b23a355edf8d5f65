import { Radian, addAngles, quantize, type Space } from "@quantgeo/core";
import type {
  Arc,
  Cardinal,
  Circle,
  Ellipse,
  Line,
  Point,
  Polygon,
  Ray,
  Rectangle,
  Segment,
  Triangle,
  Vector,
} from "./types.js";

// ============================================================================
// Points and vectors
// ============================================================================

/** Create a point, snapping both coordinates onto the space's grid */
export function point<S extends Space>(space: S, x: number, y: number): Point<S> {
  return { kind: "point", space, x: quantize(space, x), y: quantize(space, y) };
}

/** Create a vector, snapping both components onto the space's grid */
export function vector<S extends Space>(space: S, dx: number, dy: number): Vector<S> {
  return { kind: "vector", space, dx: quantize(space, dx), dy: quantize(space, dy) };
}

/** The point (0, 0) */
export function origin<S extends Space>(space: S): Point<S> {
  return point(space, 0, 0);
}

// ============================================================================
// Linear shapes
// ============================================================================

export function line<S extends Space>(through: Point<S>, direction: Vector<S>): Line<S> {
  return { kind: "line", space: through.space, point: through, direction };
}

/** Line through two points, directed from `a` to `b` */
export function lineThrough<S extends Space>(a: Point<S>, b: Point<S>): Line<S> {
  return line(a, vector(a.space, b.x - a.x, b.y - a.y));
}

export function ray<S extends Space>(from: Point<S>, direction: Vector<S>): Ray<S> {
  return { kind: "ray", space: from.space, origin: from, direction };
}

/** Ray starting at `from` and passing through `through` */
export function rayThrough<S extends Space>(from: Point<S>, through: Point<S>): Ray<S> {
  return ray(from, vector(from.space, through.x - from.x, through.y - from.y));
}

const CARDINAL_DIRECTIONS: Record<Cardinal, readonly [number, number]> = {
  right: [1, 0],
  up: [0, 1],
  left: [-1, 0],
  down: [0, -1],
};

/** Axis-aligned ray with a unit direction */
export function rayToward<S extends Space>(from: Point<S>, direction: Cardinal): Ray<S> {
  const [dx, dy] = CARDINAL_DIRECTIONS[direction];
  return ray(from, vector(from.space, dx, dy));
}

export function segment<S extends Space>(start: Point<S>, end: Point<S>): Segment<S> {
  return { kind: "segment", space: start.space, start, end };
}

// ============================================================================
// Curved shapes
// ============================================================================

/** Create a circle. A negative radius is taken by magnitude. */
export function circle<S extends Space>(center: Point<S>, radius: number): Circle<S> {
  return {
    kind: "circle",
    space: center.space,
    center,
    radius: quantize(center.space, Math.abs(radius)),
  };
}

/** Circle of radius 1 centered at the origin */
export function unitCircle<S extends Space>(space: S): Circle<S> {
  return circle(origin(space), 1);
}

/**
 * Create an ellipse. When `semiMinor > semiMajor` the axes are swapped and
 * the rotation advanced by π/2, which describes the same point set.
 */
export function ellipse<S extends Space>(
  center: Point<S>,
  semiMajor: number,
  semiMinor: number,
  rotation: Radian = Radian.zero
): Ellipse<S> {
  const space = center.space;
  const a = Math.abs(semiMajor);
  const b = Math.abs(semiMinor);
  if (b > a) {
    return {
      kind: "ellipse",
      space,
      center,
      semiMajor: quantize(space, b),
      semiMinor: quantize(space, a),
      rotation: addAngles(rotation, Radian.halfPi),
    };
  }
  return {
    kind: "ellipse",
    space,
    center,
    semiMajor: quantize(space, a),
    semiMinor: quantize(space, b),
    rotation,
  };
}

/** An ellipse with both semi-axes equal to the circle's radius */
export function ellipseFromCircle<S extends Space>(c: Circle<S>): Ellipse<S> {
  return ellipse(c.center, c.radius, c.radius);
}

/** Create an arc. As with `circle`, a negative radius is taken by magnitude. */
export function arc<S extends Space>(
  center: Point<S>,
  radius: number,
  startAngle: Radian,
  endAngle: Radian
): Arc<S> {
  return {
    kind: "arc",
    space: center.space,
    center,
    radius: quantize(center.space, Math.abs(radius)),
    startAngle,
    endAngle,
  };
}

/** Half-turn arc, counter-clockwise from `startAngle` */
export function semicircle<S extends Space>(
  center: Point<S>,
  radius: number,
  startAngle: Radian = Radian.zero
): Arc<S> {
  return arc(center, radius, startAngle, addAngles(startAngle, Radian.pi));
}

/** Quarter-turn arc, counter-clockwise from `startAngle` */
export function quarterCircle<S extends Space>(
  center: Point<S>,
  radius: number,
  startAngle: Radian = Radian.zero
): Arc<S> {
  return arc(center, radius, startAngle, addAngles(startAngle, Radian.halfPi));
}

/** The whole circle as an arc from 0 to 2π */
export function fullCircleArc<S extends Space>(center: Point<S>, radius: number): Arc<S> {
  return arc(center, radius, Radian.zero, Radian.twoPi);
}

// ============================================================================
// Area shapes
// ============================================================================

/**
 * Create a rectangle from its lower-left corner and size.
 *
 * The upper-right corner is `llx + width` (and `lly + height`) added on the
 * grid and snapped again, so a rectangle stacked on another's `ury` shares
 * that boundary exactly. Negative sizes are stored as computed.
 */
export function rectangle<S extends Space>(
  space: S,
  x: number,
  y: number,
  width: number,
  height: number
): Rectangle<S> {
  const llx = quantize(space, x);
  const lly = quantize(space, y);
  return {
    kind: "rectangle",
    space,
    llx,
    lly,
    urx: quantize(space, llx + quantize(space, width)),
    ury: quantize(space, lly + quantize(space, height)),
  };
}

/** Rectangle with the given corner coordinates, stored as given */
export function rectangleFromBounds<S extends Space>(
  space: S,
  llx: number,
  lly: number,
  urx: number,
  ury: number
): Rectangle<S> {
  return {
    kind: "rectangle",
    space,
    llx: quantize(space, llx),
    lly: quantize(space, lly),
    urx: quantize(space, urx),
    ury: quantize(space, ury),
  };
}

/** Smallest rectangle with both points as corners, in either order */
export function rectangleFromCorners<S extends Space>(a: Point<S>, b: Point<S>): Rectangle<S> {
  return rectangleFromBounds(
    a.space,
    Math.min(a.x, b.x),
    Math.min(a.y, b.y),
    Math.max(a.x, b.x),
    Math.max(a.y, b.y)
  );
}

/**
 * Create a polygon. Vertices may be points of the space or raw `[x, y]`
 * pairs, which are snapped onto its grid. Never fails; see `polygonIsValid`.
 */
export function polygon<S extends Space>(
  space: S,
  vertices: ReadonlyArray<Point<S> | readonly [number, number]>
): Polygon<S> {
  return {
    kind: "polygon",
    space,
    vertices: vertices.map((v) => (isCoordinatePair(v) ? point(space, v[0], v[1]) : v)),
  };
}

function isCoordinatePair<S extends Space>(
  v: Point<S> | readonly [number, number]
): v is readonly [number, number] {
  return Array.isArray(v);
}

export function triangle<S extends Space>(a: Point<S>, b: Point<S>, c: Point<S>): Triangle<S> {
  return { kind: "triangle", space: a.space, a, b, c };
}
