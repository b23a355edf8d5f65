import { cos, sin, tolerance, type Radian, type Space } from "@quantgeo/core";
import { circle, point, rectangleFromBounds, vector } from "./constructors.js";
import { ellipseIsCircle } from "./ellipse.js";
import { distance } from "./operations.js";
import type { Circle, Ellipse, Point, Rectangle, Vector } from "./types.js";

export function circleDiameter<S extends Space>(c: Circle<S>): number {
  return 2 * c.radius;
}

export function circleCircumference<S extends Space>(c: Circle<S>): number {
  return 2 * Math.PI * c.radius;
}

export function circleArea<S extends Space>(c: Circle<S>): number {
  return Math.PI * c.radius * c.radius;
}

export function circleBoundingBox<S extends Space>(c: Circle<S>): Rectangle<S> {
  const { x, y } = c.center;
  return rectangleFromBounds(c.space, x - c.radius, y - c.radius, x + c.radius, y + c.radius);
}

/** Whether the point lies inside or on the circle */
export function circleContains<S extends Space>(c: Circle<S>, p: Point<S>): boolean {
  return distance(c.center, p) <= c.radius + tolerance();
}

/** Whether the point lies strictly inside the circle */
export function circleContainsInterior<S extends Space>(c: Circle<S>, p: Point<S>): boolean {
  return distance(c.center, p) < c.radius - tolerance();
}

/** Whether `inner` lies entirely within `outer` (boundaries may touch) */
export function circleContainsCircle<S extends Space>(outer: Circle<S>, inner: Circle<S>): boolean {
  return distance(outer.center, inner.center) + inner.radius <= outer.radius + tolerance();
}

/** Point on the circle at `angle` from the positive x-axis */
export function pointOnCircle<S extends Space>(c: Circle<S>, angle: Radian): Point<S> {
  return point(c.space, c.center.x + c.radius * cos(angle), c.center.y + c.radius * sin(angle));
}

/** Unit tangent at `angle`, pointing counter-clockwise */
export function circleTangent<S extends Space>(c: Circle<S>, angle: Radian): Vector<S> {
  return vector(c.space, -sin(angle), cos(angle));
}

/** Point of the circle nearest to `p`. For the center itself, the point at angle 0. */
export function circleClosestPoint<S extends Space>(c: Circle<S>, p: Point<S>): Point<S> {
  const vx = p.x - c.center.x;
  const vy = p.y - c.center.y;
  const len = Math.hypot(vx, vy);
  if (len === 0) return point(c.space, c.center.x + c.radius, c.center.y);
  const k = c.radius / len;
  return point(c.space, c.center.x + vx * k, c.center.y + vy * k);
}

/** The circle an ellipse describes, or `undefined` when its axes differ */
export function circleFromEllipse<S extends Space>(e: Ellipse<S>): Circle<S> | undefined {
  if (!ellipseIsCircle(e)) return undefined;
  return circle(e.center, e.semiMajor);
}
