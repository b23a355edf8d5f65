/**
 * Axis-aligned rectangles.
 *
 * Sizes are read back from the stored corners and snapped again, so
 * `rectangleWidth(rectangle(s, x, y, w, h)) === quantize(s, w)` whenever the
 * corners did not clip.
 */

import { quantize, tolerance, type Quantized, type Space } from "@quantgeo/core";
import { point, polygon, rectangleFromBounds } from "./constructors.js";
import { symmetricInsets } from "./insets.js";
import type { Corner, EdgeInsets, Point, Polygon, Rectangle } from "./types.js";

// ============================================================================
// Dimensions
// ============================================================================

export function rectangleWidth<S extends Space>(r: Rectangle<S>): Quantized<S> {
  return quantize(r.space, r.urx - r.llx);
}

export function rectangleHeight<S extends Space>(r: Rectangle<S>): Quantized<S> {
  return quantize(r.space, r.ury - r.lly);
}

/** Whether width and height are both non-negative */
export function rectangleIsValid<S extends Space>(r: Rectangle<S>): boolean {
  return r.urx >= r.llx && r.ury >= r.lly;
}

/** Same rectangle with corners ordered so width and height are non-negative */
export function rectangleStandardized<S extends Space>(r: Rectangle<S>): Rectangle<S> {
  if (rectangleIsValid(r)) return r;
  return rectangleFromBounds(r.space, minX(r), minY(r), maxX(r), maxY(r));
}

export function minX<S extends Space>(r: Rectangle<S>): Quantized<S> {
  return r.llx <= r.urx ? r.llx : r.urx;
}

export function maxX<S extends Space>(r: Rectangle<S>): Quantized<S> {
  return r.llx <= r.urx ? r.urx : r.llx;
}

export function minY<S extends Space>(r: Rectangle<S>): Quantized<S> {
  return r.lly <= r.ury ? r.lly : r.ury;
}

export function maxY<S extends Space>(r: Rectangle<S>): Quantized<S> {
  return r.lly <= r.ury ? r.ury : r.lly;
}

/** Area of a valid rectangle; 0 when width or height is negative */
export function rectangleArea<S extends Space>(r: Rectangle<S>): number {
  if (!rectangleIsValid(r)) return 0;
  return (r.urx - r.llx) * (r.ury - r.lly);
}

/** Perimeter of a valid rectangle; 0 when width or height is negative */
export function rectanglePerimeter<S extends Space>(r: Rectangle<S>): number {
  if (!rectangleIsValid(r)) return 0;
  return 2 * (r.urx - r.llx + (r.ury - r.lly));
}

// ============================================================================
// Points
// ============================================================================

/** The stored lower-left corner */
export function rectangleOrigin<S extends Space>(r: Rectangle<S>): Point<S> {
  return point(r.space, r.llx, r.lly);
}

export function rectangleCorner<S extends Space>(r: Rectangle<S>, corner: Corner): Point<S> {
  switch (corner) {
    case "lowerLeft":
      return point(r.space, r.llx, r.lly);
    case "lowerRight":
      return point(r.space, r.urx, r.lly);
    case "upperRight":
      return point(r.space, r.urx, r.ury);
    case "upperLeft":
      return point(r.space, r.llx, r.ury);
  }
}

export function rectangleCenter<S extends Space>(r: Rectangle<S>): Point<S> {
  return point(r.space, (r.llx + r.urx) / 2, (r.lly + r.ury) / 2);
}

// ============================================================================
// Containment and set operations
// ============================================================================

/** Whether the point lies inside or on the boundary */
export function rectangleContains<S extends Space>(r: Rectangle<S>, p: Point<S>): boolean {
  const eps = tolerance();
  return (
    p.x >= minX(r) - eps && p.x <= maxX(r) + eps && p.y >= minY(r) - eps && p.y <= maxY(r) + eps
  );
}

/** Whether `inner` lies entirely within `outer` (boundaries may touch) */
export function rectangleContainsRectangle<S extends Space>(
  outer: Rectangle<S>,
  inner: Rectangle<S>
): boolean {
  const eps = tolerance();
  return (
    minX(inner) >= minX(outer) - eps &&
    maxX(inner) <= maxX(outer) + eps &&
    minY(inner) >= minY(outer) - eps &&
    maxY(inner) <= maxY(outer) + eps
  );
}

/** Whether the rectangles overlap or touch */
export function rectanglesIntersect<S extends Space>(a: Rectangle<S>, b: Rectangle<S>): boolean {
  const eps = tolerance();
  return (
    minX(a) <= maxX(b) + eps &&
    minX(b) <= maxX(a) + eps &&
    minY(a) <= maxY(b) + eps &&
    minY(b) <= maxY(a) + eps
  );
}

/** Smallest rectangle containing both */
export function rectangleUnion<S extends Space>(a: Rectangle<S>, b: Rectangle<S>): Rectangle<S> {
  return rectangleFromBounds(
    a.space,
    Math.min(minX(a), minX(b)),
    Math.min(minY(a), minY(b)),
    Math.max(maxX(a), maxX(b)),
    Math.max(maxY(a), maxY(b))
  );
}

/** Overlap of two rectangles, or `undefined` when they are disjoint */
export function rectangleIntersection<S extends Space>(
  a: Rectangle<S>,
  b: Rectangle<S>
): Rectangle<S> | undefined {
  if (!rectanglesIntersect(a, b)) return undefined;
  const llx = Math.max(minX(a), minX(b));
  const lly = Math.max(minY(a), minY(b));
  return rectangleFromBounds(
    a.space,
    llx,
    lly,
    Math.max(llx, Math.min(maxX(a), maxX(b))),
    Math.max(lly, Math.min(maxY(a), maxY(b)))
  );
}

// ============================================================================
// Derived rectangles
// ============================================================================

/** Move every edge inward by `dx` horizontally and `dy` vertically */
export function rectangleInset<S extends Space>(
  r: Rectangle<S>,
  dx: number,
  dy?: number
): Rectangle<S>;
/** Move each edge inward by its own inset */
export function rectangleInset<S extends Space>(r: Rectangle<S>, insets: EdgeInsets): Rectangle<S>;
export function rectangleInset(r: Rectangle, by: number | EdgeInsets, dy?: number): Rectangle {
  const insets = typeof by === "number" ? symmetricInsets(by, dy ?? by) : by;
  return rectangleFromBounds(
    r.space,
    r.llx + insets.leading,
    r.lly + insets.bottom,
    r.urx - insets.trailing,
    r.ury - insets.top
  );
}

export interface RectangleBounds {
  llx?: number;
  lly?: number;
  urx?: number;
  ury?: number;
}

/** Copy with some corner coordinates replaced */
export function rectangleWith<S extends Space>(
  r: Rectangle<S>,
  bounds: RectangleBounds
): Rectangle<S> {
  return rectangleFromBounds(
    r.space,
    bounds.llx ?? r.llx,
    bounds.lly ?? r.lly,
    bounds.urx ?? r.urx,
    bounds.ury ?? r.ury
  );
}

/** The four corners, counter-clockwise from the lower left */
export function rectangleToPolygon<S extends Space>(r: Rectangle<S>): Polygon<S> {
  return polygon(r.space, [
    rectangleCorner(r, "lowerLeft"),
    rectangleCorner(r, "lowerRight"),
    rectangleCorner(r, "upperRight"),
    rectangleCorner(r, "upperLeft"),
  ]);
}
