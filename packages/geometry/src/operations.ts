import { radians, type Radian, type Space } from "@quantgeo/core";
import { point, vector } from "./constructors.js";
import type { Point, Vector } from "./types.js";

// Every result that is a point or vector is snapped back onto the grid of
// the operand's space.

/** Translate a point by a vector: `p + v` */
export function translate<S extends Space>(p: Point<S>, v: Vector<S>): Point<S> {
  return point(p.space, p.x + v.dx, p.y + v.dy);
}

/** Displacement vector from one point to another: `to - from` */
export function displacement<S extends Space>(from: Point<S>, to: Point<S>): Vector<S> {
  return vector(from.space, to.x - from.x, to.y - from.y);
}

/** Component-wise vector addition */
export function addVec<S extends Space>(a: Vector<S>, b: Vector<S>): Vector<S> {
  return vector(a.space, a.dx + b.dx, a.dy + b.dy);
}

/** Component-wise vector subtraction */
export function subVec<S extends Space>(a: Vector<S>, b: Vector<S>): Vector<S> {
  return vector(a.space, a.dx - b.dx, a.dy - b.dy);
}

/** Scale a vector by a scalar */
export function scale<S extends Space>(v: Vector<S>, scalar: number): Vector<S> {
  return vector(v.space, v.dx * scalar, v.dy * scalar);
}

/** Negate a vector (reverse direction) */
export function negate<S extends Space>(v: Vector<S>): Vector<S> {
  return vector(v.space, -v.dx, -v.dy);
}

/** Dot product of two vectors */
export function dot<S extends Space>(a: Vector<S>, b: Vector<S>): number {
  return a.dx * b.dx + a.dy * b.dy;
}

/** 2D cross product (z component of the 3D cross product) */
export function cross<S extends Space>(a: Vector<S>, b: Vector<S>): number {
  return a.dx * b.dy - a.dy * b.dx;
}

/** Euclidean length of a vector */
export function magnitude<S extends Space>(v: Vector<S>): number {
  return Math.hypot(v.dx, v.dy);
}

export function magnitudeSquared<S extends Space>(v: Vector<S>): number {
  return v.dx * v.dx + v.dy * v.dy;
}

/** Unit vector in the same direction, or `undefined` for the zero vector */
export function normalize<S extends Space>(v: Vector<S>): Vector<S> | undefined {
  const mag = magnitude(v);
  if (mag === 0) return undefined;
  return vector(v.space, v.dx / mag, v.dy / mag);
}

/** Euclidean distance between two points */
export function distance<S extends Space>(a: Point<S>, b: Point<S>): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function distanceSquared<S extends Space>(a: Point<S>, b: Point<S>): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return dx * dx + dy * dy;
}

/** Midpoint of two points */
export function midpoint<S extends Space>(a: Point<S>, b: Point<S>): Point<S> {
  return point(a.space, (a.x + b.x) / 2, (a.y + b.y) / 2);
}

/** Linear interpolation between two points: `a*(1-t) + b*t` */
export function lerp<S extends Space>(a: Point<S>, b: Point<S>, t: number): Point<S> {
  return point(a.space, a.x * (1 - t) + b.x * t, a.y * (1 - t) + b.y * t);
}

/** Unsigned angle between two vectors; 0 when either is the zero vector */
export function angleBetween<S extends Space>(a: Vector<S>, b: Vector<S>): Radian {
  const m = magnitude(a) * magnitude(b);
  if (m === 0) return radians(0);
  return radians(Math.acos(Math.max(-1, Math.min(1, dot(a, b) / m))));
}

/** The vector rotated a quarter turn counter-clockwise */
export function perpendicular<S extends Space>(v: Vector<S>): Vector<S> {
  return vector(v.space, -v.dy, v.dx);
}
