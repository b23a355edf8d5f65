import { isApproxZero, tolerance, type Space } from "@quantgeo/core";
import { line, point } from "./constructors.js";
import { lineDistance, lineParameter } from "./line.js";
import { distance, normalize } from "./operations.js";
import type { Line, Point, Ray, Vector } from "./types.js";

/** Unit direction, or `undefined` when the direction is the zero vector */
export function rayUnitDirection<S extends Space>(r: Ray<S>): Vector<S> | undefined {
  return normalize(r.direction);
}

/** The supporting line */
export function rayLine<S extends Space>(r: Ray<S>): Line<S> {
  return line(r.origin, r.direction);
}

/**
 * `origin + t·direction`. Evaluates for any real `t`; only containment is
 * restricted to `t ≥ 0`.
 */
export function pointOnRay<S extends Space>(r: Ray<S>, t: number): Point<S> {
  return point(r.space, r.origin.x + t * r.direction.dx, r.origin.y + t * r.direction.dy);
}

/**
 * Whether the point lies on the ray: on the supporting line and at a
 * parameter `t ≥ -ε`, so the origin itself is contained.
 */
export function rayContains<S extends Space>(r: Ray<S>, p: Point<S>): boolean {
  const supporting = rayLine(r);
  const d = lineDistance(supporting, p);
  const t = lineParameter(supporting, p);
  if (d === undefined || t === undefined) return isApproxZero(distance(r.origin, p));
  return isApproxZero(d) && t >= -tolerance();
}

/** Point of the ray nearest to `p` */
export function rayClosestPoint<S extends Space>(r: Ray<S>, p: Point<S>): Point<S> {
  const t = lineParameter(rayLine(r), p);
  if (t === undefined || t <= 0) return r.origin;
  return pointOnRay(r, t);
}

/** Distance from `p` to the nearest point of the ray */
export function rayDistance<S extends Space>(r: Ray<S>, p: Point<S>): number {
  const t = Math.max(0, lineParameter(rayLine(r), p) ?? 0);
  const cx = r.origin.x + t * r.direction.dx;
  const cy = r.origin.y + t * r.direction.dy;
  return Math.hypot(p.x - cx, p.y - cy);
}
