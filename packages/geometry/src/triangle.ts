import { isApproxZero, tolerance, type Space } from "@quantgeo/core";
import { circle, point, polygon, rectangleFromBounds, segment } from "./constructors.js";
import { distance } from "./operations.js";
import { segmentContains } from "./segment.js";
import type { Circle, Point, Polygon, Rectangle, Triangle } from "./types.js";

/** Barycentric weights of a point with respect to `a`, `b` and `c` */
export interface Barycentric {
  readonly u: number;
  readonly v: number;
  readonly w: number;
}

export function triangleVertices<S extends Space>(
  t: Triangle<S>
): readonly [Point<S>, Point<S>, Point<S>] {
  return [t.a, t.b, t.c];
}

/** `(b - a) × (c - a)`; positive when the vertices run counter-clockwise */
export function triangleSignedDoubleArea<S extends Space>(t: Triangle<S>): number {
  return (t.b.x - t.a.x) * (t.c.y - t.a.y) - (t.c.x - t.a.x) * (t.b.y - t.a.y);
}

export function triangleArea<S extends Space>(t: Triangle<S>): number {
  return Math.abs(triangleSignedDoubleArea(t)) / 2;
}

export function trianglePerimeter<S extends Space>(t: Triangle<S>): number {
  return distance(t.a, t.b) + distance(t.b, t.c) + distance(t.c, t.a);
}

export function triangleCentroid<S extends Space>(t: Triangle<S>): Point<S> {
  return point(t.space, (t.a.x + t.b.x + t.c.x) / 3, (t.a.y + t.b.y + t.c.y) / 3);
}

/** Barycentric coordinates of `p`, or `undefined` for a degenerate triangle */
export function triangleBarycentric<S extends Space>(
  t: Triangle<S>,
  p: Point<S>
): Barycentric | undefined {
  const d = triangleSignedDoubleArea(t);
  if (isApproxZero(d)) return undefined;
  const u = ((t.b.x - p.x) * (t.c.y - p.y) - (t.c.x - p.x) * (t.b.y - p.y)) / d;
  const v = ((t.c.x - p.x) * (t.a.y - p.y) - (t.a.x - p.x) * (t.c.y - p.y)) / d;
  return { u, v, w: 1 - u - v };
}

/** Whether the point lies inside or on the boundary */
export function triangleContains<S extends Space>(t: Triangle<S>, p: Point<S>): boolean {
  const bary = triangleBarycentric(t, p);
  if (bary === undefined) {
    return (
      segmentContains(segment(t.a, t.b), p) ||
      segmentContains(segment(t.b, t.c), p) ||
      segmentContains(segment(t.c, t.a), p)
    );
  }
  const eps = -tolerance();
  return bary.u >= eps && bary.v >= eps && bary.w >= eps;
}

/** Circle through all three vertices */
export function triangleCircumcircle<S extends Space>(t: Triangle<S>): Circle<S> | undefined {
  const { a, b, c } = t;
  const d = 2 * (a.x * (b.y - c.y) + b.x * (c.y - a.y) + c.x * (a.y - b.y));
  if (isApproxZero(d)) return undefined;

  const a2 = a.x * a.x + a.y * a.y;
  const b2 = b.x * b.x + b.y * b.y;
  const c2 = c.x * c.x + c.y * c.y;
  const ux = (a2 * (b.y - c.y) + b2 * (c.y - a.y) + c2 * (a.y - b.y)) / d;
  const uy = (a2 * (c.x - b.x) + b2 * (a.x - c.x) + c2 * (b.x - a.x)) / d;

  return circle(point(t.space, ux, uy), Math.hypot(a.x - ux, a.y - uy));
}

/** Largest circle inside the triangle */
export function triangleIncircle<S extends Space>(t: Triangle<S>): Circle<S> | undefined {
  const area = triangleArea(t);
  if (isApproxZero(area)) return undefined;

  const la = distance(t.b, t.c);
  const lb = distance(t.c, t.a);
  const lc = distance(t.a, t.b);
  const p = la + lb + lc;

  const cx = (la * t.a.x + lb * t.b.x + lc * t.c.x) / p;
  const cy = (la * t.a.y + lb * t.b.y + lc * t.c.y) / p;
  return circle(point(t.space, cx, cy), (2 * area) / p);
}

export function triangleBoundingBox<S extends Space>(t: Triangle<S>): Rectangle<S> {
  return rectangleFromBounds(
    t.space,
    Math.min(t.a.x, t.b.x, t.c.x),
    Math.min(t.a.y, t.b.y, t.c.y),
    Math.max(t.a.x, t.b.x, t.c.x),
    Math.max(t.a.y, t.b.y, t.c.y)
  );
}

export function triangleToPolygon<S extends Space>(t: Triangle<S>): Polygon<S> {
  return polygon(t.space, [t.a, t.b, t.c]);
}
