/**
 * Shape types.
 *
 * Every shape is a readonly plain object with a `kind` discriminator and the
 * `space` it lives in. Coordinates are `Quantized<S>`, so a shape can only be
 * built through the constructors, which snap every value onto the space's
 * grid, and shapes from differently tagged spaces don't mix.
 */

import type { Quantized, Radian, Space } from "@quantgeo/core";

// ============================================================================
// Points and vectors
// ============================================================================

/** A position in space `S` */
export interface Point<S extends Space = Space> {
  readonly kind: "point";
  readonly space: S;
  readonly x: Quantized<S>;
  readonly y: Quantized<S>;
}

/** A displacement in space `S`; has no position */
export interface Vector<S extends Space = Space> {
  readonly kind: "vector";
  readonly space: S;
  readonly dx: Quantized<S>;
  readonly dy: Quantized<S>;
}

// ============================================================================
// Linear shapes
// ============================================================================

/** Infinite line through `point`. `direction` need not be unit length. */
export interface Line<S extends Space = Space> {
  readonly kind: "line";
  readonly space: S;
  readonly point: Point<S>;
  readonly direction: Vector<S>;
}

/** Half-line `origin + t·direction` for `t ≥ 0` */
export interface Ray<S extends Space = Space> {
  readonly kind: "ray";
  readonly space: S;
  readonly origin: Point<S>;
  readonly direction: Vector<S>;
}

/** `start + t·(end − start)` for `t ∈ [0, 1]` */
export interface Segment<S extends Space = Space> {
  readonly kind: "segment";
  readonly space: S;
  readonly start: Point<S>;
  readonly end: Point<S>;
}

// ============================================================================
// Curved shapes
// ============================================================================

export interface Circle<S extends Space = Space> {
  readonly kind: "circle";
  readonly space: S;
  readonly center: Point<S>;
  readonly radius: Quantized<S>;
}

/**
 * Ellipse. `rotation` is the counter-clockwise angle from the x-axis to the
 * `semiMajor` axis. The constructor orders the axes so `semiMajor ≥
 * semiMinor`; a mapped ellipse keeps its fields where the map put them.
 */
export interface Ellipse<S extends Space = Space> {
  readonly kind: "ellipse";
  readonly space: S;
  readonly center: Point<S>;
  readonly semiMajor: Quantized<S>;
  readonly semiMinor: Quantized<S>;
  readonly rotation: Radian;
}

/**
 * Circular arc from `startAngle` to `endAngle`, both measured
 * counter-clockwise from the positive x-axis. The arc runs counter-clockwise
 * when `endAngle > startAngle` and clockwise otherwise; a sweep of 2π or
 * more covers the whole circle.
 */
export interface Arc<S extends Space = Space> {
  readonly kind: "arc";
  readonly space: S;
  readonly center: Point<S>;
  readonly radius: Quantized<S>;
  readonly startAngle: Radian;
  readonly endAngle: Radian;
}

// ============================================================================
// Area shapes
// ============================================================================

/**
 * Axis-aligned rectangle stored by its lower-left and upper-right corners.
 * The corners are stored as computed, so `urx < llx` is representable; see
 * `rectangleIsValid`.
 */
export interface Rectangle<S extends Space = Space> {
  readonly kind: "rectangle";
  readonly space: S;
  readonly llx: Quantized<S>;
  readonly lly: Quantized<S>;
  readonly urx: Quantized<S>;
  readonly ury: Quantized<S>;
}

export interface Triangle<S extends Space = Space> {
  readonly kind: "triangle";
  readonly space: S;
  readonly a: Point<S>;
  readonly b: Point<S>;
  readonly c: Point<S>;
}

/**
 * Distances to move each edge of a rectangle inward. `top` and `bottom`
 * apply to `ury` and `lly`; `leading` and `trailing` to `llx` and `urx`.
 * Negative values move an edge outward.
 */
export interface EdgeInsets {
  readonly top: number;
  readonly leading: number;
  readonly bottom: number;
  readonly trailing: number;
}

/** Closed polygon; the last vertex connects back to the first. */
export interface Polygon<S extends Space = Space> {
  readonly kind: "polygon";
  readonly space: S;
  readonly vertices: readonly Point<S>[];
}

/** Any shape */
export type Shape<S extends Space = Space> =
  | Point<S>
  | Vector<S>
  | Line<S>
  | Ray<S>
  | Segment<S>
  | Circle<S>
  | Ellipse<S>
  | Arc<S>
  | Rectangle<S>
  | Triangle<S>
  | Polygon<S>;

/** Shape kind discriminator */
export type ShapeKind = Shape["kind"];

// ============================================================================
// Enumerations
// ============================================================================

/** Axis-aligned unit directions */
export type Cardinal = "right" | "up" | "left" | "down";

/** Rectangle corners */
export type Corner = "lowerLeft" | "lowerRight" | "upperRight" | "upperLeft";

// ============================================================================
// Transforms
// ============================================================================

declare const transformBrand: unique symbol;

/**
 * 2D affine transform as a row-major 3x3 homogeneous matrix in a flat
 * 9-element array.
 */
export type Transform = readonly number[] & { readonly [transformBrand]: "transform2d" };
