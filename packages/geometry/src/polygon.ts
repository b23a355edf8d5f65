/**
 * Polygon engine: metrics, orientation, containment and triangulation.
 *
 * A polygon with fewer than three vertices is constructible but invalid;
 * metric queries on it return 0, `false` or `undefined` rather than throwing.
 * Orientation follows the sign of the shoelace sum: positive is
 * counter-clockwise.
 */

import {
  Radian,
  cos,
  isApproxZero,
  logger,
  radians,
  sin,
  tolerance,
  type Space,
} from "@quantgeo/core";
import { point, polygon, rectangleFromBounds, segment, triangle } from "./constructors.js";
import { distance } from "./operations.js";
import { segmentDistance } from "./segment.js";
import { applyToPoint } from "./transforms.js";
import { triangleContains } from "./triangle.js";
import type { Point, Polygon, Rectangle, Segment, Transform, Triangle, Vector } from "./types.js";

// ============================================================================
// Construction
// ============================================================================

/**
 * Regular polygon with `sides` vertices on a circle of `circumradius`, the
 * first at `rotation` from the positive x-axis, counter-clockwise.
 */
export function regularPolygon<S extends Space>(
  center: Point<S>,
  sides: number,
  circumradius: number,
  rotation: Radian = Radian.zero
): Polygon<S> {
  const vertices: Point<S>[] = [];
  for (let i = 0; i < sides; i++) {
    const theta = radians(rotation + (2 * Math.PI * i) / sides);
    vertices.push(
      point(
        center.space,
        center.x + circumradius * cos(theta),
        center.y + circumradius * sin(theta)
      )
    );
  }
  return polygon(center.space, vertices);
}

// ============================================================================
// Structure
// ============================================================================

export function polygonVertexCount<S extends Space>(poly: Polygon<S>): number {
  return poly.vertices.length;
}

/** At least three vertices */
export function polygonIsValid<S extends Space>(poly: Polygon<S>): boolean {
  return poly.vertices.length >= 3;
}

/** The N edges, the last one closing back to the first vertex */
export function polygonEdges<S extends Space>(poly: Polygon<S>): Segment<S>[] {
  const { vertices } = poly;
  const n = vertices.length;
  if (n < 2) return [];
  return vertices.map((v, i) => segment(v, vertices[(i + 1) % n]));
}

// ============================================================================
// Metrics
// ============================================================================

/** Shoelace sum `Σ (x_i·y_{i+1} − x_{i+1}·y_i)`; twice the signed area */
export function polygonSignedDoubleArea<S extends Space>(poly: Polygon<S>): number {
  const { vertices } = poly;
  const n = vertices.length;
  if (n < 3) return 0;
  let sum = 0;
  for (let i = 0; i < n; i++) {
    const a = vertices[i];
    const b = vertices[(i + 1) % n];
    sum += a.x * b.y - b.x * a.y;
  }
  return sum;
}

export function polygonArea<S extends Space>(poly: Polygon<S>): number {
  return Math.abs(polygonSignedDoubleArea(poly)) / 2;
}

export function polygonPerimeter<S extends Space>(poly: Polygon<S>): number {
  return polygonEdges(poly).reduce((sum, e) => sum + distance(e.start, e.end), 0);
}

/**
 * Area centroid, snapped onto the polygon's grid. `undefined` when the
 * polygon has fewer than three vertices or no area at the precision of its
 * scalar type: the area is compared against the squared extent of the
 * vertices, so a tiny polygon still has a centroid.
 */
export function polygonCentroid<S extends Space>(poly: Polygon<S>): Point<S> | undefined {
  const { vertices } = poly;
  const n = vertices.length;
  if (n < 3) return undefined;

  const doubleArea = polygonSignedDoubleArea(poly);
  const xs = vertices.map((v) => v.x);
  const ys = vertices.map((v) => v.y);
  const extent = Math.max(Math.max(...xs) - Math.min(...xs), Math.max(...ys) - Math.min(...ys));
  if (Math.abs(doubleArea) <= poly.space.scalar.epsilon * extent * extent) return undefined;

  let cx = 0;
  let cy = 0;
  for (let i = 0; i < n; i++) {
    const a = vertices[i];
    const b = vertices[(i + 1) % n];
    const f = a.x * b.y - b.x * a.y;
    cx += (a.x + b.x) * f;
    cy += (a.y + b.y) * f;
  }
  return point(poly.space, cx / (3 * doubleArea), cy / (3 * doubleArea));
}

export function polygonBoundingBox<S extends Space>(poly: Polygon<S>): Rectangle<S> | undefined {
  const { vertices } = poly;
  if (vertices.length === 0) return undefined;
  const xs = vertices.map((v) => v.x);
  const ys = vertices.map((v) => v.y);
  return rectangleFromBounds(
    poly.space,
    Math.min(...xs),
    Math.min(...ys),
    Math.max(...xs),
    Math.max(...ys)
  );
}

// ============================================================================
// Orientation and convexity
// ============================================================================

/** Cross product of the edges entering and leaving vertex `i` */
function turn<S extends Space>(vertices: readonly Point<S>[], i: number): number {
  const n = vertices.length;
  const a = vertices[(i + n - 1) % n];
  const b = vertices[i];
  const c = vertices[(i + 1) % n];
  return (b.x - a.x) * (c.y - b.y) - (b.y - a.y) * (c.x - b.x);
}

/**
 * Whether every turn goes the same way. Collinear vertices are ignored, so
 * every valid triangle is convex.
 */
export function polygonIsConvex<S extends Space>(poly: Polygon<S>): boolean {
  const { vertices } = poly;
  const n = vertices.length;
  if (n < 3) return false;

  let sign = 0;
  for (let i = 0; i < n; i++) {
    const t = turn(vertices, i);
    if (isApproxZero(t)) continue;
    const s = Math.sign(t);
    if (sign === 0) sign = s;
    else if (s !== sign) return false;
  }
  return true;
}

export function polygonIsCounterClockwise<S extends Space>(poly: Polygon<S>): boolean {
  return polygonSignedDoubleArea(poly) > 0;
}

export function polygonIsClockwise<S extends Space>(poly: Polygon<S>): boolean {
  return polygonSignedDoubleArea(poly) < 0;
}

/** Same vertices in the opposite order */
export function polygonReversed<S extends Space>(poly: Polygon<S>): Polygon<S> {
  return polygon(poly.space, [...poly.vertices].reverse());
}

// ============================================================================
// Containment
// ============================================================================

/** Whether the point lies within tolerance of some edge */
export function polygonIsOnBoundary<S extends Space>(poly: Polygon<S>, p: Point<S>): boolean {
  const eps = tolerance();
  return polygonEdges(poly).some((e) => segmentDistance(e, p) <= eps);
}

/**
 * Whether the point lies inside or on the boundary. The boundary is tested
 * first; ray casting decides the rest by crossing parity.
 */
export function polygonContains<S extends Space>(poly: Polygon<S>, p: Point<S>): boolean {
  const { vertices } = poly;
  const n = vertices.length;
  if (n < 3) return false;
  if (polygonIsOnBoundary(poly, p)) return true;

  let inside = false;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const vi = vertices[i];
    const vj = vertices[j];
    if (vi.y > p.y !== vj.y > p.y) {
      const xCross = vi.x + ((vj.x - vi.x) * (p.y - vi.y)) / (vj.y - vi.y);
      if (p.x < xCross) inside = !inside;
    }
  }
  return inside;
}

/** Whether the point lies strictly inside */
export function polygonContainsInterior<S extends Space>(poly: Polygon<S>, p: Point<S>): boolean {
  return polygonContains(poly, p) && !polygonIsOnBoundary(poly, p);
}

/**
 * Number of times the boundary winds around the point; positive for
 * counter-clockwise turns. Zero outside a simple polygon.
 */
export function polygonWindingNumber<S extends Space>(poly: Polygon<S>, p: Point<S>): number {
  const { vertices } = poly;
  const n = vertices.length;
  let winding = 0;
  for (let i = 0; i < n; i++) {
    const a = vertices[i];
    const b = vertices[(i + 1) % n];
    const side = (b.x - a.x) * (p.y - a.y) - (p.x - a.x) * (b.y - a.y);
    if (a.y <= p.y) {
      if (b.y > p.y && side > 0) winding++;
    } else if (b.y <= p.y && side < 0) {
      winding--;
    }
  }
  return winding;
}

// ============================================================================
// Triangulation
// ============================================================================

/** Fan of N − 2 triangles sharing the first vertex */
export function polygonFanTriangulate<S extends Space>(poly: Polygon<S>): Triangle<S>[] {
  const { vertices } = poly;
  const triangles: Triangle<S>[] = [];
  for (let i = 1; i + 1 < vertices.length; i++) {
    triangles.push(triangle(vertices[0], vertices[i], vertices[i + 1]));
  }
  return triangles;
}

/**
 * Split into N − 2 triangles with the polygon's orientation. Convex polygons
 * are fanned from the first vertex; other simple polygons are ear-clipped.
 */
export function polygonTriangulate<S extends Space>(poly: Polygon<S>): Triangle<S>[] {
  const n = poly.vertices.length;
  if (n < 3) return [];
  if (polygonIsConvex(poly)) {
    logger.debug(`triangulating ${n}-gon as a fan`);
    return polygonFanTriangulate(poly);
  }
  logger.debug(`triangulating ${n}-gon by ear clipping`);
  return earClip(poly);
}

function earClip<S extends Space>(poly: Polygon<S>): Triangle<S>[] {
  const orientation = Math.sign(polygonSignedDoubleArea(poly));
  const remaining = [...poly.vertices];
  const triangles: Triangle<S>[] = [];

  while (remaining.length > 3) {
    const ear = findEar(remaining, orientation);
    if (ear === undefined) {
      logger.warn(
        `no ear found with ${remaining.length} vertices left; polygon is not simple, fanning the rest`
      );
      return [...triangles, ...polygonFanTriangulate(polygon(poly.space, remaining))];
    }
    const n = remaining.length;
    triangles.push(
      triangle(remaining[(ear + n - 1) % n], remaining[ear], remaining[(ear + 1) % n])
    );
    remaining.splice(ear, 1);
  }

  triangles.push(triangle(remaining[0], remaining[1], remaining[2]));
  return triangles;
}

/** Index of a convex vertex whose triangle holds no other remaining vertex */
function findEar<S extends Space>(
  vertices: readonly Point<S>[],
  orientation: number
): number | undefined {
  const n = vertices.length;
  for (let i = 0; i < n; i++) {
    const t = turn(vertices, i) * orientation;
    if (t <= tolerance()) continue;

    const prev = (i + n - 1) % n;
    const next = (i + 1) % n;
    const candidate = triangle(vertices[prev], vertices[i], vertices[next]);
    const blocked = vertices.some(
      (v, j) =>
        j !== prev &&
        j !== i &&
        j !== next &&
        !isCorner(candidate, v) &&
        triangleContains(candidate, v)
    );
    if (!blocked) return i;
  }
  return undefined;
}

function isCorner<S extends Space>(t: Triangle<S>, p: Point<S>): boolean {
  return [t.a, t.b, t.c].some((v) => v.x === p.x && v.y === p.y);
}

// ============================================================================
// Transformation
// ============================================================================

export function polygonTranslated<S extends Space>(poly: Polygon<S>, v: Vector<S>): Polygon<S> {
  return polygon(
    poly.space,
    poly.vertices.map((p) => point(poly.space, p.x + v.dx, p.y + v.dy))
  );
}

/** Scale about an arbitrary point: `v' = about + k·(v − about)` */
export function polygonScaledAbout<S extends Space>(
  poly: Polygon<S>,
  factor: number,
  about: Point<S>
): Polygon<S> {
  return polygon(
    poly.space,
    poly.vertices.map((p) =>
      point(poly.space, about.x + factor * (p.x - about.x), about.y + factor * (p.y - about.y))
    )
  );
}

/** Scale about the centroid; `undefined` when the centroid is */
export function polygonScaled<S extends Space>(
  poly: Polygon<S>,
  factor: number
): Polygon<S> | undefined {
  const centroid = polygonCentroid(poly);
  if (centroid === undefined) return undefined;
  return polygonScaledAbout(poly, factor, centroid);
}

/** Apply an affine transform to every vertex */
export function polygonTransformed<S extends Space>(poly: Polygon<S>, t: Transform): Polygon<S> {
  return polygon(poly.space, poly.vertices.map((p) => applyToPoint(t, p)));
}
