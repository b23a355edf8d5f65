/**
 * Infinite lines.
 *
 * Queries that need a well-defined direction return `undefined` when the
 * line's direction is the zero vector.
 */

import { isApproxZero, type Space } from "@quantgeo/core";
import { point } from "./constructors.js";
import { distance, magnitude, normalize } from "./operations.js";
import type { Line, Point, Vector } from "./types.js";

export function lineUnitDirection<S extends Space>(l: Line<S>): Vector<S> | undefined {
  return normalize(l.direction);
}

/** `point + t·direction`, for any real `t` */
export function pointOnLine<S extends Space>(l: Line<S>, t: number): Point<S> {
  return point(l.space, l.point.x + t * l.direction.dx, l.point.y + t * l.direction.dy);
}

/** Perpendicular distance from a point to the line */
export function lineDistance<S extends Space>(l: Line<S>, p: Point<S>): number | undefined {
  const len = magnitude(l.direction);
  if (isApproxZero(len)) return undefined;
  const wx = p.x - l.point.x;
  const wy = p.y - l.point.y;
  return Math.abs(l.direction.dx * wy - l.direction.dy * wx) / len;
}

/** Parameter of the foot of the perpendicular from `p` */
export function lineParameter<S extends Space>(l: Line<S>, p: Point<S>): number | undefined {
  const { dx, dy } = l.direction;
  const lenSq = dx * dx + dy * dy;
  if (isApproxZero(lenSq)) return undefined;
  return ((p.x - l.point.x) * dx + (p.y - l.point.y) * dy) / lenSq;
}

/** Orthogonal projection of a point onto the line */
export function lineProjection<S extends Space>(l: Line<S>, p: Point<S>): Point<S> | undefined {
  const t = lineParameter(l, p);
  if (t === undefined) return undefined;
  return pointOnLine(l, t);
}

/** Mirror image of a point across the line */
export function lineReflection<S extends Space>(l: Line<S>, p: Point<S>): Point<S> | undefined {
  const t = lineParameter(l, p);
  if (t === undefined) return undefined;
  const fx = l.point.x + t * l.direction.dx;
  const fy = l.point.y + t * l.direction.dy;
  return point(l.space, 2 * fx - p.x, 2 * fy - p.y);
}

/** Whether the point lies on the line. A zero-direction line contains only its point. */
export function lineContains<S extends Space>(l: Line<S>, p: Point<S>): boolean {
  const d = lineDistance(l, p);
  if (d === undefined) return isApproxZero(distance(l.point, p));
  return isApproxZero(d);
}
