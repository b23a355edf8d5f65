import { cos, isApproxZero, sin, type Radian, type Space } from "@quantgeo/core";
import { point, vector } from "./constructors.js";
import type { Point, Transform, Vector } from "./types.js";

// ---------------------------------------------------------------------------
// Internal helpers: flat row-major homogeneous matrices
// ---------------------------------------------------------------------------

function transform(m: readonly number[]): Transform {
  return m as Transform;
}

/**
 * Multiply two 3x3 matrices stored as flat 9-element arrays (row-major).
 * Result = a * b
 */
function mul3(a: readonly number[], b: readonly number[]): number[] {
  return [
    a[0] * b[0] + a[1] * b[3] + a[2] * b[6],
    a[0] * b[1] + a[1] * b[4] + a[2] * b[7],
    a[0] * b[2] + a[1] * b[5] + a[2] * b[8],

    a[3] * b[0] + a[4] * b[3] + a[5] * b[6],
    a[3] * b[1] + a[4] * b[4] + a[5] * b[7],
    a[3] * b[2] + a[4] * b[5] + a[5] * b[8],

    a[6] * b[0] + a[7] * b[3] + a[8] * b[6],
    a[6] * b[1] + a[7] * b[4] + a[8] * b[7],
    a[6] * b[2] + a[7] * b[5] + a[8] * b[8],
  ];
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

/** Rotation around the origin by `angle` (counter-clockwise) */
export function rotation2d(angle: Radian): Transform {
  const c = cos(angle);
  const s = sin(angle);
  // prettier-ignore
  return transform([
    c, -s,  0,
    s,  c,  0,
    0,  0,  1,
  ]);
}

/** Translation by (dx, dy) */
export function translation2d(dx: number, dy: number): Transform {
  // prettier-ignore
  return transform([
    1, 0, dx,
    0, 1, dy,
    0, 0,  1,
  ]);
}

/** Scale by (sx, sy) about the origin */
export function scale2d(sx: number, sy: number = sx): Transform {
  // prettier-ignore
  return transform([
    sx,  0, 0,
     0, sy, 0,
     0,  0, 1,
  ]);
}

/** Shear by (sx, sy) */
export function shear2d(sx: number, sy: number): Transform {
  // prettier-ignore
  return transform([
    1, sx, 0,
    sy, 1, 0,
     0, 0, 1,
  ]);
}

export function identity2d(): Transform {
  // prettier-ignore
  return transform([
    1, 0, 0,
    0, 1, 0,
    0, 0, 1,
  ]);
}

// ---------------------------------------------------------------------------
// Application
// ---------------------------------------------------------------------------

/** Apply a transform to a point (includes translation) */
export function applyToPoint<S extends Space>(t: Transform, p: Point<S>): Point<S> {
  return point(p.space, t[0] * p.x + t[1] * p.y + t[2], t[3] * p.x + t[4] * p.y + t[5]);
}

/** Apply a transform to a vector (translation is ignored) */
export function applyToVector<S extends Space>(t: Transform, v: Vector<S>): Vector<S> {
  return vector(v.space, t[0] * v.dx + t[1] * v.dy, t[3] * v.dx + t[4] * v.dy);
}

// ---------------------------------------------------------------------------
// Composition and utilities
// ---------------------------------------------------------------------------

/** Compose two transforms: apply `first`, then `second` */
export function compose(first: Transform, second: Transform): Transform {
  return transform(mul3(second, first));
}

/** Rotation by `angle` around `pivot` */
export function rotationAbout(angle: Radian, pivot: Point): Transform {
  const toOrigin = translation2d(-pivot.x, -pivot.y);
  return compose(compose(toOrigin, rotation2d(angle)), translation2d(pivot.x, pivot.y));
}

/** Uniform scale by `factor` about `pivot` */
export function scaleAbout(factor: number, pivot: Point): Transform {
  const toOrigin = translation2d(-pivot.x, -pivot.y);
  return compose(compose(toOrigin, scale2d(factor)), translation2d(pivot.x, pivot.y));
}

/** Determinant of the linear part */
export function determinant(t: Transform): number {
  return (
    t[0] * (t[4] * t[8] - t[5] * t[7]) -
    t[1] * (t[3] * t[8] - t[5] * t[6]) +
    t[2] * (t[3] * t[7] - t[4] * t[6])
  );
}

/**
 * Inverse of a transform by Cramer's rule, or `undefined` when the matrix is
 * singular.
 */
export function inverse(t: Transform): Transform | undefined {
  const det = determinant(t);
  if (isApproxZero(det)) return undefined;

  const invDet = 1 / det;
  return transform([
    (t[4] * t[8] - t[5] * t[7]) * invDet,
    (t[2] * t[7] - t[1] * t[8]) * invDet,
    (t[1] * t[5] - t[2] * t[4]) * invDet,

    (t[5] * t[6] - t[3] * t[8]) * invDet,
    (t[0] * t[8] - t[2] * t[6]) * invDet,
    (t[2] * t[3] - t[0] * t[5]) * invDet,

    (t[3] * t[7] - t[4] * t[6]) * invDet,
    (t[1] * t[6] - t[0] * t[7]) * invDet,
    (t[0] * t[4] - t[1] * t[3]) * invDet,
  ]);
}
