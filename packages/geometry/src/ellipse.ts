/**
 * Ellipse metrics and parametric evaluation.
 *
 * Parametric functions take the eccentric anomaly `t`, not the polar angle
 * of the resulting point: `pointOnEllipse(e, t)` is
 * `center + R(rotation)·(a·cos t, b·sin t)`.
 */

import { approxEqual, cos, sin, tolerance, type Radian, type Space } from "@quantgeo/core";
import { point, rectangleFromBounds, vector } from "./constructors.js";
import type { Ellipse, Point, Rectangle, Vector } from "./types.js";

// ============================================================================
// Metrics
// ============================================================================

/** Length of the major axis, `2a` */
export function ellipseMajorAxis<S extends Space>(e: Ellipse<S>): number {
  return 2 * e.semiMajor;
}

/** Length of the minor axis, `2b` */
export function ellipseMinorAxis<S extends Space>(e: Ellipse<S>): number {
  return 2 * e.semiMinor;
}

/** `sqrt(1 - (b/a)²)`; 0 for a circle or a degenerate ellipse with `a = 0` */
export function ellipseEccentricity<S extends Space>(e: Ellipse<S>): number {
  const a = e.semiMajor;
  const b = e.semiMinor;
  if (a === 0 || a === b) return 0;
  const ratio = b / a;
  return Math.sqrt(Math.max(0, 1 - ratio * ratio));
}

/** Distance from the center to each focus, `sqrt(a² - b²)` */
export function ellipseFocalDistance<S extends Space>(e: Ellipse<S>): number {
  const a = e.semiMajor;
  const b = e.semiMinor;
  if (a <= b) return 0;
  return Math.sqrt(a * a - b * b);
}

/** The two foci along the major axis; both are the center for a circle */
export function ellipseFoci<S extends Space>(e: Ellipse<S>): readonly [Point<S>, Point<S>] {
  const c = ellipseFocalDistance(e);
  const ux = c * cos(e.rotation);
  const uy = c * sin(e.rotation);
  return [
    point(e.space, e.center.x - ux, e.center.y - uy),
    point(e.space, e.center.x + ux, e.center.y + uy),
  ];
}

export function ellipseArea<S extends Space>(e: Ellipse<S>): number {
  return Math.PI * e.semiMajor * e.semiMinor;
}

/** Ramanujan's approximation; exactly `2πr` for a circle */
export function ellipsePerimeter<S extends Space>(e: Ellipse<S>): number {
  const a = e.semiMajor;
  const b = e.semiMinor;
  const sum = a + b;
  if (sum === 0) return 0;
  const diff = a - b;
  const h = (diff * diff) / (sum * sum);
  return Math.PI * sum * (1 + (3 * h) / (10 + Math.sqrt(4 - 3 * h)));
}

/** Whether both semi-axes agree within tolerance */
export function ellipseIsCircle<S extends Space>(e: Ellipse<S>): boolean {
  return approxEqual(e.semiMajor, e.semiMinor);
}

// ============================================================================
// Parametric evaluation
// ============================================================================

export function pointOnEllipse<S extends Space>(e: Ellipse<S>, t: Radian): Point<S> {
  const x = e.semiMajor * cos(t);
  const y = e.semiMinor * sin(t);
  const cr = cos(e.rotation);
  const sr = sin(e.rotation);
  return point(e.space, e.center.x + x * cr - y * sr, e.center.y + x * sr + y * cr);
}

/** Derivative of `pointOnEllipse` with respect to `t`; not normalized */
export function ellipseTangent<S extends Space>(e: Ellipse<S>, t: Radian): Vector<S> {
  const dx = -e.semiMajor * sin(t);
  const dy = e.semiMinor * cos(t);
  const cr = cos(e.rotation);
  const sr = sin(e.rotation);
  return vector(e.space, dx * cr - dy * sr, dx * sr + dy * cr);
}

// ============================================================================
// Containment and bounds
// ============================================================================

/** Whether the point lies inside or on the ellipse */
export function ellipseContains<S extends Space>(e: Ellipse<S>, p: Point<S>): boolean {
  const eps = tolerance();
  const dx = p.x - e.center.x;
  const dy = p.y - e.center.y;
  const cr = cos(e.rotation);
  const sr = sin(e.rotation);
  const localX = dx * cr + dy * sr;
  const localY = -dx * sr + dy * cr;

  const a = e.semiMajor;
  const b = e.semiMinor;
  // a flat ellipse is the segment along its major axis
  if (b === 0) return Math.abs(localY) <= eps && Math.abs(localX) <= a + eps;

  return (localX * localX) / (a * a) + (localY * localY) / (b * b) <= 1 + eps;
}

export function ellipseBoundingBox<S extends Space>(e: Ellipse<S>): Rectangle<S> {
  const a2 = e.semiMajor * e.semiMajor;
  const b2 = e.semiMinor * e.semiMinor;
  const cr = cos(e.rotation);
  const sr = sin(e.rotation);
  const halfWidth = Math.sqrt(a2 * cr * cr + b2 * sr * sr);
  const halfHeight = Math.sqrt(a2 * sr * sr + b2 * cr * cr);
  const { x, y } = e.center;
  return rectangleFromBounds(e.space, x - halfWidth, y - halfHeight, x + halfWidth, y + halfHeight);
}
