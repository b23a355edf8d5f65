/**
 * Typeclass instances for geometry types.
 *
 * - Eq: tolerance-based comparison of points and vectors
 * - Show: `Point(1, 2)`, `Circle(Point(0, 0), r=1)`, ...
 */

import { makeEq, tolerance, type Eq, type Show, type Space } from "@quantgeo/core";
import type { Point, Shape, Vector } from "./types.js";

// ============================================================================
// Eq instances
// Component-wise equality within a tolerance
// ============================================================================

/**
 * Create an Eq instance for points. The tolerance defaults to the configured
 * one, read when the instance is created.
 */
export function eqPoint<S extends Space>(epsilon: number = tolerance()): Eq<Point<S>> {
  return makeEq((a, b) => Math.abs(a.x - b.x) <= epsilon && Math.abs(a.y - b.y) <= epsilon);
}

/** Create an Eq instance for vectors; see `eqPoint` */
export function eqVector<S extends Space>(epsilon: number = tolerance()): Eq<Vector<S>> {
  return makeEq((a, b) => Math.abs(a.dx - b.dx) <= epsilon && Math.abs(a.dy - b.dy) <= epsilon);
}

// ============================================================================
// Show instances
// ============================================================================

function showPointRaw(p: Point): string {
  return `Point(${p.x}, ${p.y})`;
}

function showVectorRaw(v: Vector): string {
  return `Vector(${v.dx}, ${v.dy})`;
}

function render(shape: Shape): string {
  switch (shape.kind) {
    case "point":
      return showPointRaw(shape);
    case "vector":
      return showVectorRaw(shape);
    case "line":
      return `Line(${showPointRaw(shape.point)}, ${showVectorRaw(shape.direction)})`;
    case "ray":
      return `Ray(${showPointRaw(shape.origin)}, ${showVectorRaw(shape.direction)})`;
    case "segment":
      return `Segment(${showPointRaw(shape.start)}, ${showPointRaw(shape.end)})`;
    case "circle":
      return `Circle(${showPointRaw(shape.center)}, r=${shape.radius})`;
    case "ellipse": {
      const axes = `a=${shape.semiMajor}, b=${shape.semiMinor}`;
      return `Ellipse(${showPointRaw(shape.center)}, ${axes}, rotation=${shape.rotation})`;
    }
    case "arc": {
      const angles = `from=${shape.startAngle}, to=${shape.endAngle}`;
      return `Arc(${showPointRaw(shape.center)}, r=${shape.radius}, ${angles})`;
    }
    case "rectangle":
      return `Rectangle(Point(${shape.llx}, ${shape.lly}), Point(${shape.urx}, ${shape.ury}))`;
    case "triangle":
      return `Triangle(${[shape.a, shape.b, shape.c].map(showPointRaw).join(", ")})`;
    case "polygon":
      return `Polygon(${shape.vertices.map(showPointRaw).join(", ")})`;
  }
}

export const showPoint: Show<Point> = { show: showPointRaw };

export const showVector: Show<Vector> = { show: showVectorRaw };

/** Show instance for every shape kind */
export const showShape: Show<Shape> = { show: render };
