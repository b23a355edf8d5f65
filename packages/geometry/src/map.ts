/**
 * Functorial map: rebuild a shape with every scalar passed through a
 * function and snapped onto the destination space's grid.
 *
 * For every field, `mapX(shape, f, to).field === quantize(to, f(shape.field))`.
 * The destination defaults to the source space; a destination with another
 * quantum or scalar type re-expresses the shape there. Angles are not
 * scalars of the space and are carried over unchanged.
 *
 * @example
 * ```typescript
 * const Pdf = defineSpace("pdf", { quantum: 0.01 });
 * const Mm = defineSpace("mm", { quantum: 0.1 });
 * const box = rectangle(Pdf, 0, 0, 72, 36);
 * mapShape(box, (pt) => pt * 25.4 / 72, Mm);   // Rectangle<Space<"mm">>
 * ```
 */

import { quantize, type Space } from "@quantgeo/core";
import {
  line,
  point,
  polygon,
  ray,
  rectangleFromBounds,
  segment,
  triangle,
  vector,
} from "./constructors.js";
import type {
  Arc,
  Circle,
  Ellipse,
  Line,
  Point,
  Polygon,
  Ray,
  Rectangle,
  Segment,
  Shape,
  Triangle,
  Vector,
} from "./types.js";

/** Scalar conversion applied to every coordinate */
export type ScalarMap = (value: number) => number;

export function mapPoint<S extends Space, D extends Space = S>(
  p: Point<S>,
  f: ScalarMap,
  to?: D
): Point<D>;
export function mapPoint(p: Point, f: ScalarMap, to?: Space): Point {
  return point(to ?? p.space, f(p.x), f(p.y));
}

export function mapVector<S extends Space, D extends Space = S>(
  v: Vector<S>,
  f: ScalarMap,
  to?: D
): Vector<D>;
export function mapVector(v: Vector, f: ScalarMap, to?: Space): Vector {
  return vector(to ?? v.space, f(v.dx), f(v.dy));
}

export function mapLine<S extends Space, D extends Space = S>(
  l: Line<S>,
  f: ScalarMap,
  to?: D
): Line<D>;
export function mapLine(l: Line, f: ScalarMap, to?: Space): Line {
  const space = to ?? l.space;
  return line(mapPoint(l.point, f, space), mapVector(l.direction, f, space));
}

export function mapRay<S extends Space, D extends Space = S>(
  r: Ray<S>,
  f: ScalarMap,
  to?: D
): Ray<D>;
export function mapRay(r: Ray, f: ScalarMap, to?: Space): Ray {
  const space = to ?? r.space;
  return ray(mapPoint(r.origin, f, space), mapVector(r.direction, f, space));
}

export function mapSegment<S extends Space, D extends Space = S>(
  s: Segment<S>,
  f: ScalarMap,
  to?: D
): Segment<D>;
export function mapSegment(s: Segment, f: ScalarMap, to?: Space): Segment {
  const space = to ?? s.space;
  return segment(mapPoint(s.start, f, space), mapPoint(s.end, f, space));
}

/** Radius is mapped as stored; a negating map yields a negative radius */
export function mapCircle<S extends Space, D extends Space = S>(
  c: Circle<S>,
  f: ScalarMap,
  to?: D
): Circle<D>;
export function mapCircle(c: Circle, f: ScalarMap, to?: Space): Circle {
  const space = to ?? c.space;
  return {
    kind: "circle",
    space,
    center: mapPoint(c.center, f, space),
    radius: quantize(space, f(c.radius)),
  };
}

/** Semi-axes are mapped in place, never re-ordered */
export function mapEllipse<S extends Space, D extends Space = S>(
  e: Ellipse<S>,
  f: ScalarMap,
  to?: D
): Ellipse<D>;
export function mapEllipse(e: Ellipse, f: ScalarMap, to?: Space): Ellipse {
  const space = to ?? e.space;
  return {
    kind: "ellipse",
    space,
    center: mapPoint(e.center, f, space),
    semiMajor: quantize(space, f(e.semiMajor)),
    semiMinor: quantize(space, f(e.semiMinor)),
    rotation: e.rotation,
  };
}

/** Center and radius are mapped; the end angles are carried over */
export function mapArc<S extends Space, D extends Space = S>(
  a: Arc<S>,
  f: ScalarMap,
  to?: D
): Arc<D>;
export function mapArc(a: Arc, f: ScalarMap, to?: Space): Arc {
  const space = to ?? a.space;
  return {
    kind: "arc",
    space,
    center: mapPoint(a.center, f, space),
    radius: quantize(space, f(a.radius)),
    startAngle: a.startAngle,
    endAngle: a.endAngle,
  };
}

/** Maps the four stored corner coordinates independently */
export function mapRectangle<S extends Space, D extends Space = S>(
  r: Rectangle<S>,
  f: ScalarMap,
  to?: D
): Rectangle<D>;
export function mapRectangle(r: Rectangle, f: ScalarMap, to?: Space): Rectangle {
  return rectangleFromBounds(to ?? r.space, f(r.llx), f(r.lly), f(r.urx), f(r.ury));
}

export function mapTriangle<S extends Space, D extends Space = S>(
  t: Triangle<S>,
  f: ScalarMap,
  to?: D
): Triangle<D>;
export function mapTriangle(t: Triangle, f: ScalarMap, to?: Space): Triangle {
  const space = to ?? t.space;
  return triangle(mapPoint(t.a, f, space), mapPoint(t.b, f, space), mapPoint(t.c, f, space));
}

export function mapPolygon<S extends Space, D extends Space = S>(
  p: Polygon<S>,
  f: ScalarMap,
  to?: D
): Polygon<D>;
export function mapPolygon(p: Polygon, f: ScalarMap, to?: Space): Polygon {
  const space = to ?? p.space;
  return polygon(space, p.vertices.map((v) => mapPoint(v, f, space)));
}

// ============================================================================
// Dispatcher
// ============================================================================

export function mapShape<S extends Space, D extends Space = S>(
  shape: Point<S>,
  f: ScalarMap,
  to?: D
): Point<D>;
export function mapShape<S extends Space, D extends Space = S>(
  shape: Vector<S>,
  f: ScalarMap,
  to?: D
): Vector<D>;
export function mapShape<S extends Space, D extends Space = S>(
  shape: Line<S>,
  f: ScalarMap,
  to?: D
): Line<D>;
export function mapShape<S extends Space, D extends Space = S>(
  shape: Ray<S>,
  f: ScalarMap,
  to?: D
): Ray<D>;
export function mapShape<S extends Space, D extends Space = S>(
  shape: Segment<S>,
  f: ScalarMap,
  to?: D
): Segment<D>;
export function mapShape<S extends Space, D extends Space = S>(
  shape: Circle<S>,
  f: ScalarMap,
  to?: D
): Circle<D>;
export function mapShape<S extends Space, D extends Space = S>(
  shape: Ellipse<S>,
  f: ScalarMap,
  to?: D
): Ellipse<D>;
export function mapShape<S extends Space, D extends Space = S>(
  shape: Arc<S>,
  f: ScalarMap,
  to?: D
): Arc<D>;
export function mapShape<S extends Space, D extends Space = S>(
  shape: Rectangle<S>,
  f: ScalarMap,
  to?: D
): Rectangle<D>;
export function mapShape<S extends Space, D extends Space = S>(
  shape: Triangle<S>,
  f: ScalarMap,
  to?: D
): Triangle<D>;
export function mapShape<S extends Space, D extends Space = S>(
  shape: Polygon<S>,
  f: ScalarMap,
  to?: D
): Polygon<D>;
export function mapShape<S extends Space, D extends Space = S>(
  shape: Shape<S>,
  f: ScalarMap,
  to?: D
): Shape<D>;
export function mapShape(shape: Shape, f: ScalarMap, to?: Space): Shape {
  switch (shape.kind) {
    case "point":
      return mapPoint(shape, f, to);
    case "vector":
      return mapVector(shape, f, to);
    case "line":
      return mapLine(shape, f, to);
    case "ray":
      return mapRay(shape, f, to);
    case "segment":
      return mapSegment(shape, f, to);
    case "circle":
      return mapCircle(shape, f, to);
    case "ellipse":
      return mapEllipse(shape, f, to);
    case "arc":
      return mapArc(shape, f, to);
    case "rectangle":
      return mapRectangle(shape, f, to);
    case "triangle":
      return mapTriangle(shape, f, to);
    case "polygon":
      return mapPolygon(shape, f, to);
  }
}
