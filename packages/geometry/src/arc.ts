/**
 * Circular arcs: sweep, points along the arc, length, bounds and
 * containment.
 *
 * Angle tests measure each angle's offset from `startAngle` in the direction
 * of travel, so an arc that crosses the positive x-axis needs no special
 * case. An arc sweeping 2π or more contains every angle.
 */

import {
  atan2,
  cos,
  normalizeAngle,
  radians,
  sin,
  tolerance,
  type Radian,
  type Space,
} from "@quantgeo/core";
import { circle, point, rectangleFromBounds, vector } from "./constructors.js";
import { distance } from "./operations.js";
import type { Arc, Circle, Point, Rectangle, Vector } from "./types.js";

const TAU = Math.PI * 2;

// ============================================================================
// Angles
// ============================================================================

/** Signed angular span, `endAngle - startAngle` */
export function arcSweep<S extends Space>(a: Arc<S>): Radian {
  return radians(a.endAngle - a.startAngle);
}

export function arcIsCounterClockwise<S extends Space>(a: Arc<S>): boolean {
  return arcSweep(a) > 0;
}

/** Whether the arc covers its whole circle */
export function arcIsFullCircle<S extends Space>(a: Arc<S>): boolean {
  return Math.abs(arcSweep(a)) >= TAU - tolerance();
}

/** Whether the direction `angle` from the center falls within the arc */
export function arcCoversAngle<S extends Space>(a: Arc<S>, angle: Radian): boolean {
  const sweep = arcSweep(a);
  const direction = sweep >= 0 ? 1 : -1;
  const eps = tolerance();
  let offset: number = normalizeAngle(radians(direction * (angle - a.startAngle)));
  // just behind the start wraps to the top of [0, 2π)
  if (offset >= TAU - eps) offset = 0;
  return offset <= Math.abs(sweep) + eps;
}

// ============================================================================
// Points
// ============================================================================

function pointAtAngle<S extends Space>(a: Arc<S>, angle: Radian): Point<S> {
  return point(a.space, a.center.x + a.radius * cos(angle), a.center.y + a.radius * sin(angle));
}

export function arcStartPoint<S extends Space>(a: Arc<S>): Point<S> {
  return pointAtAngle(a, a.startAngle);
}

export function arcEndPoint<S extends Space>(a: Arc<S>): Point<S> {
  return pointAtAngle(a, a.endAngle);
}

/** Point halfway along the arc */
export function arcMidPoint<S extends Space>(a: Arc<S>): Point<S> {
  return pointAtAngle(a, radians((a.startAngle + a.endAngle) / 2));
}

/** Point at parameter `t`: 0 is the start, 1 the end */
export function pointOnArc<S extends Space>(a: Arc<S>, t: number): Point<S> {
  return pointAtAngle(a, radians(a.startAngle + t * arcSweep(a)));
}

/** Unit tangent at parameter `t`, pointing the way the arc travels */
export function arcTangent<S extends Space>(a: Arc<S>, t: number): Vector<S> {
  const angle = radians(a.startAngle + t * arcSweep(a));
  const sign = arcSweep(a) >= 0 ? 1 : -1;
  return vector(a.space, -sign * sin(angle), sign * cos(angle));
}

// ============================================================================
// Metrics
// ============================================================================

/** Length along the arc, `r·|sweep|` */
export function arcLength<S extends Space>(a: Arc<S>): number {
  return a.radius * Math.abs(arcSweep(a));
}

/**
 * Axis-aligned bounds: the endpoints, widened to the circle's extreme in
 * each axis direction the arc passes through.
 */
export function arcBoundingBox<S extends Space>(a: Arc<S>): Rectangle<S> {
  const { x: cx, y: cy } = a.center;
  const r = a.radius;
  if (arcIsFullCircle(a)) {
    return rectangleFromBounds(a.space, cx - r, cy - r, cx + r, cy + r);
  }

  const start = arcStartPoint(a);
  const end = arcEndPoint(a);
  let minX = Math.min(start.x, end.x);
  let maxX = Math.max(start.x, end.x);
  let minY = Math.min(start.y, end.y);
  let maxY = Math.max(start.y, end.y);

  if (arcCoversAngle(a, radians(0))) maxX = Math.max(maxX, cx + r);
  if (arcCoversAngle(a, radians(Math.PI / 2))) maxY = Math.max(maxY, cy + r);
  if (arcCoversAngle(a, radians(Math.PI))) minX = Math.min(minX, cx - r);
  if (arcCoversAngle(a, radians((3 * Math.PI) / 2))) minY = Math.min(minY, cy - r);

  return rectangleFromBounds(a.space, minX, minY, maxX, maxY);
}

// ============================================================================
// Queries and derived shapes
// ============================================================================

/** Whether the point lies on the arc, within tolerance of its circle */
export function arcContains<S extends Space>(a: Arc<S>, p: Point<S>): boolean {
  if (Math.abs(distance(a.center, p) - a.radius) > tolerance()) return false;
  return arcCoversAngle(a, atan2(p.y - a.center.y, p.x - a.center.x));
}

/** The same arc traversed the other way */
export function arcReversed<S extends Space>(a: Arc<S>): Arc<S> {
  return { ...a, startAngle: a.endAngle, endAngle: a.startAngle };
}

/** The circle the arc lies on */
export function arcCircle<S extends Space>(a: Arc<S>): Circle<S> {
  return circle(a.center, a.radius);
}
