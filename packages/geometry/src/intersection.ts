/**
 * Intersection algorithms.
 *
 * All closed form. Linear pairs solve a 2×2 system for the parameters of
 * both shapes; anything involving a circle reduces to a quadratic in the
 * linear shape's parameter. Parameter ranges are checked with the configured
 * tolerance so that endpoints and ray origins count as hits.
 *
 * Parallel directions (colinear overlap included) have no single
 * intersection point and yield `undefined`.
 */

import { tolerance, type Space } from "@quantgeo/core";
import { point, vector } from "./constructors.js";
import { distance } from "./operations.js";
import { polygonEdges } from "./polygon.js";
import type { Circle, Line, Point, Polygon, Ray, Segment, Vector } from "./types.js";

// ============================================================================
// Linear solve
// ============================================================================

interface Parameters {
  /** Parameter along the first shape */
  readonly t: number;
  /** Parameter along the second shape */
  readonly s: number;
}

/**
 * Solve `p + t·d = q + s·e`. `undefined` when the directions are parallel,
 * tested on the sine of the angle between them: `|d × e| ≤ ε·|d|·|e|`.
 */
function solve<S extends Space>(
  p: Point<S>,
  d: Vector<S>,
  q: Point<S>,
  e: Vector<S>
): Parameters | undefined {
  const denom = d.dx * e.dy - d.dy * e.dx;
  const scale = Math.hypot(d.dx, d.dy) * Math.hypot(e.dx, e.dy);
  if (Math.abs(denom) <= tolerance() * scale) return undefined;

  const wx = q.x - p.x;
  const wy = q.y - p.y;
  return {
    t: (wx * e.dy - wy * e.dx) / denom,
    s: (wx * d.dy - wy * d.dx) / denom,
  };
}

function along<S extends Space>(p: Point<S>, d: Vector<S>, t: number): Point<S> {
  return point(p.space, p.x + t * d.dx, p.y + t * d.dy);
}

function segmentDirection<S extends Space>(seg: Segment<S>): Vector<S> {
  return vector(seg.space, seg.end.x - seg.start.x, seg.end.y - seg.start.y);
}

const forward = (t: number): boolean => t >= -tolerance();
const unit = (t: number): boolean => t >= -tolerance() && t <= 1 + tolerance();

// ============================================================================
// Linear shapes
// ============================================================================

export function intersectRayLine<S extends Space>(
  ray: Ray<S>,
  line: Line<S>
): Point<S> | undefined {
  const params = solve(ray.origin, ray.direction, line.point, line.direction);
  if (params === undefined || !forward(params.t)) return undefined;
  return along(ray.origin, ray.direction, params.t);
}

export function intersectRaySegment<S extends Space>(
  ray: Ray<S>,
  seg: Segment<S>
): Point<S> | undefined {
  const params = solve(ray.origin, ray.direction, seg.start, segmentDirection(seg));
  if (params === undefined || !forward(params.t) || !unit(params.s)) return undefined;
  return along(ray.origin, ray.direction, params.t);
}

export function intersectRayRay<S extends Space>(a: Ray<S>, b: Ray<S>): Point<S> | undefined {
  const params = solve(a.origin, a.direction, b.origin, b.direction);
  if (params === undefined || !forward(params.t) || !forward(params.s)) return undefined;
  return along(a.origin, a.direction, params.t);
}

export function intersectLines<S extends Space>(a: Line<S>, b: Line<S>): Point<S> | undefined {
  const params = solve(a.point, a.direction, b.point, b.direction);
  if (params === undefined) return undefined;
  return along(a.point, a.direction, params.t);
}

export function intersectSegments<S extends Space>(
  a: Segment<S>,
  b: Segment<S>
): Point<S> | undefined {
  const da = segmentDirection(a);
  const params = solve(a.start, da, b.start, segmentDirection(b));
  if (params === undefined || !unit(params.t) || !unit(params.s)) return undefined;
  return along(a.start, da, params.t);
}

// ============================================================================
// Circles
// ============================================================================

/**
 * Parameters `t` where `p + t·d` meets the circle, in increasing order.
 * A zero direction meets the circle only if `p` lies on it.
 */
function circleParameters<S extends Space>(p: Point<S>, d: Vector<S>, c: Circle<S>): number[] {
  const eps = tolerance();
  const fx = p.x - c.center.x;
  const fy = p.y - c.center.y;

  const a = d.dx * d.dx + d.dy * d.dy;
  if (a === 0) {
    return Math.abs(Math.hypot(fx, fy) - c.radius) <= eps ? [0] : [];
  }
  const b = 2 * (fx * d.dx + fy * d.dy);
  const k = fx * fx + fy * fy - c.radius * c.radius;

  const disc = b * b - 4 * a * k;
  // the discriminant is compared relative to the size of its terms
  const slack = eps * Math.max(1, b * b, Math.abs(4 * a * k));
  if (disc < -slack) return [];
  if (disc <= slack) return [-b / (2 * a)];

  const root = Math.sqrt(disc);
  return [(-b - root) / (2 * a), (-b + root) / (2 * a)];
}

/**
 * Points where the ray meets the circle: two when it passes through, one
 * when tangent or when the origin is inside (the exit point), none on a miss.
 */
export function intersectRayCircle<S extends Space>(ray: Ray<S>, c: Circle<S>): Point<S>[] {
  return circleParameters(ray.origin, ray.direction, c)
    .filter(forward)
    .map((t) => along(ray.origin, ray.direction, t));
}

export function intersectLineCircle<S extends Space>(line: Line<S>, c: Circle<S>): Point<S>[] {
  return circleParameters(line.point, line.direction, c).map((t) =>
    along(line.point, line.direction, t)
  );
}

export function intersectSegmentCircle<S extends Space>(
  seg: Segment<S>,
  c: Circle<S>
): Point<S>[] {
  const d = segmentDirection(seg);
  return circleParameters(seg.start, d, c)
    .filter(unit)
    .map((t) => along(seg.start, d, t));
}

/** Whether the two circles' boundaries meet */
export function circlesIntersect<S extends Space>(a: Circle<S>, b: Circle<S>): boolean {
  const eps = tolerance();
  const d = distance(a.center, b.center);
  return d <= a.radius + b.radius + eps && d >= Math.abs(a.radius - b.radius) - eps;
}

/**
 * Points where the boundaries meet: 0, 1 (touching) or 2. Concentric
 * circles yield none, even when they coincide.
 */
export function intersectCircles<S extends Space>(a: Circle<S>, b: Circle<S>): Point<S>[] {
  const eps = tolerance();
  const d = distance(a.center, b.center);
  if (d <= eps || !circlesIntersect(a, b)) return [];

  const r1 = a.radius;
  const r2 = b.radius;
  const offset = (r1 * r1 - r2 * r2 + d * d) / (2 * d);
  const hSq = r1 * r1 - offset * offset;

  const ux = (b.center.x - a.center.x) / d;
  const uy = (b.center.y - a.center.y) / d;
  const px = a.center.x + offset * ux;
  const py = a.center.y + offset * uy;

  if (hSq <= eps) return [point(a.space, px, py)];

  const h = Math.sqrt(hSq);
  return [point(a.space, px + h * uy, py - h * ux), point(a.space, px - h * uy, py + h * ux)];
}

// ============================================================================
// Polygons
// ============================================================================

/**
 * Crossings of `p + t·d` with every polygon edge whose parameter passes
 * `accept`, ordered by `t`. A crossing through a shared vertex is reported once.
 */
function polygonCrossings<S extends Space>(
  p: Point<S>,
  d: Vector<S>,
  poly: Polygon<S>,
  accept: (t: number) => boolean
): Point<S>[] {
  const eps = tolerance();
  const hits: number[] = [];
  for (const edge of polygonEdges(poly)) {
    const params = solve(p, d, edge.start, segmentDirection(edge));
    if (params === undefined || !accept(params.t) || !unit(params.s)) continue;
    hits.push(params.t);
  }
  hits.sort((x, y) => x - y);

  const points: Point<S>[] = [];
  let last: Point<S> | undefined;
  for (const t of hits) {
    const hit = along(p, d, t);
    if (last !== undefined && distance(last, hit) <= eps) continue;
    points.push(hit);
    last = hit;
  }
  return points;
}

/** Points where the ray crosses the polygon's boundary, nearest first */
export function intersectRayPolygon<S extends Space>(ray: Ray<S>, poly: Polygon<S>): Point<S>[] {
  return polygonCrossings(ray.origin, ray.direction, poly, forward);
}

/** Points where the line crosses the polygon's boundary, in direction order */
export function intersectLinePolygon<S extends Space>(
  line: Line<S>,
  poly: Polygon<S>
): Point<S>[] {
  return polygonCrossings(line.point, line.direction, poly, () => true);
}
