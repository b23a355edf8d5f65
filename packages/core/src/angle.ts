/**
 * Angles in radians.
 *
 * `Radian` is a branded `number`, so an angle can't be passed where a length
 * is expected (and vice versa) without going through `radians()`.
 */

declare const radianBrand: unique symbol;

export type Radian = number & { readonly [radianBrand]: "radian" };

const TAU = Math.PI * 2;

/** Create an angle from a value in radians */
export function radians(value: number): Radian {
  return value as Radian;
}

/** Create an angle from a value in degrees */
export function degrees(value: number): Radian {
  return radians((value * Math.PI) / 180);
}

/** Common angles */
export const Radian = {
  zero: radians(0),
  halfPi: radians(Math.PI / 2),
  pi: radians(Math.PI),
  twoPi: radians(TAU),
} as const;

/** Convert an angle to degrees */
export function toDegrees(angle: Radian): number {
  return (angle * 180) / Math.PI;
}

export function sin(angle: Radian): number {
  return Math.sin(angle);
}

export function cos(angle: Radian): number {
  return Math.cos(angle);
}

/** Angle of the vector (x, y) from the positive x-axis, in (-π, π] */
export function atan2(y: number, x: number): Radian {
  return radians(Math.atan2(y, x));
}

export function addAngles(a: Radian, b: Radian): Radian {
  return radians(a + b);
}

export function negateAngle(a: Radian): Radian {
  return radians(-a);
}

/** Wrap an angle into [0, 2π) */
export function normalizeAngle(angle: Radian): Radian {
  const r = angle % TAU;
  return radians(r < 0 ? r + TAU : r);
}
