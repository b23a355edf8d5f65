/**
 * Translate, rotate and scale any shape.
 *
 * Rotation and scaling pivot on `about` when given, otherwise on the shape's
 * own reference point: a line's point, a ray's origin, a segment's midpoint,
 * the center of a circle, ellipse, arc or rectangle, and the centroid of a
 * triangle or polygon. Polygons with no centroid have no default pivot and
 * yield `undefined`.
 */

import { Radian, addAngles, type Space } from "@quantgeo/core";
import {
  arc,
  circle,
  ellipse,
  line,
  polygon,
  ray,
  rectangleFromBounds,
  rectangleFromCorners,
  segment,
  triangle,
} from "./constructors.js";
import { scale, translate } from "./operations.js";
import {
  polygonCentroid,
  polygonScaled,
  polygonScaledAbout,
  polygonTranslated,
} from "./polygon.js";
import { rectangleCenter, rectangleCorner, rectangleToPolygon } from "./rectangle.js";
import { segmentMidpoint } from "./segment.js";
import {
  applyToPoint,
  applyToVector,
  rotation2d,
  rotationAbout,
  scaleAbout,
} from "./transforms.js";
import { triangleCentroid } from "./triangle.js";
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

// ============================================================================
// Translation
// ============================================================================

export function translated<S extends Space>(shape: Point<S>, by: Vector<S>): Point<S>;
/** Vectors have no position; translating one returns it unchanged. */
export function translated<S extends Space>(shape: Vector<S>, by: Vector<S>): Vector<S>;
export function translated<S extends Space>(shape: Line<S>, by: Vector<S>): Line<S>;
export function translated<S extends Space>(shape: Ray<S>, by: Vector<S>): Ray<S>;
export function translated<S extends Space>(shape: Segment<S>, by: Vector<S>): Segment<S>;
export function translated<S extends Space>(shape: Circle<S>, by: Vector<S>): Circle<S>;
export function translated<S extends Space>(shape: Ellipse<S>, by: Vector<S>): Ellipse<S>;
export function translated<S extends Space>(shape: Arc<S>, by: Vector<S>): Arc<S>;
export function translated<S extends Space>(shape: Rectangle<S>, by: Vector<S>): Rectangle<S>;
export function translated<S extends Space>(shape: Triangle<S>, by: Vector<S>): Triangle<S>;
export function translated<S extends Space>(shape: Polygon<S>, by: Vector<S>): Polygon<S>;
export function translated<S extends Space>(shape: Shape<S>, by: Vector<S>): Shape<S>;
export function translated(shape: Shape, by: Vector): Shape {
  switch (shape.kind) {
    case "point":
      return translate(shape, by);
    case "vector":
      return shape;
    case "line":
      return line(translate(shape.point, by), shape.direction);
    case "ray":
      return ray(translate(shape.origin, by), shape.direction);
    case "segment":
      return segment(translate(shape.start, by), translate(shape.end, by));
    case "circle":
      return circle(translate(shape.center, by), shape.radius);
    case "ellipse":
      return ellipse(
        translate(shape.center, by),
        shape.semiMajor,
        shape.semiMinor,
        shape.rotation
      );
    case "arc":
      return arc(translate(shape.center, by), shape.radius, shape.startAngle, shape.endAngle);
    case "rectangle":
      return rectangleFromBounds(
        shape.space,
        shape.llx + by.dx,
        shape.lly + by.dy,
        shape.urx + by.dx,
        shape.ury + by.dy
      );
    case "triangle":
      return triangle(translate(shape.a, by), translate(shape.b, by), translate(shape.c, by));
    case "polygon":
      return polygonTranslated(shape, by);
  }
}

// ============================================================================
// Rotation
// ============================================================================

export function rotated<S extends Space>(
  shape: Point<S>,
  angle: Radian,
  about?: Point<S>
): Point<S>;
export function rotated<S extends Space>(shape: Vector<S>, angle: Radian): Vector<S>;
export function rotated<S extends Space>(shape: Line<S>, angle: Radian, about?: Point<S>): Line<S>;
export function rotated<S extends Space>(shape: Ray<S>, angle: Radian, about?: Point<S>): Ray<S>;
export function rotated<S extends Space>(
  shape: Segment<S>,
  angle: Radian,
  about?: Point<S>
): Segment<S>;
export function rotated<S extends Space>(
  shape: Circle<S>,
  angle: Radian,
  about?: Point<S>
): Circle<S>;
/** Moves the center and advances the ellipse's own rotation by `angle`. */
export function rotated<S extends Space>(
  shape: Ellipse<S>,
  angle: Radian,
  about?: Point<S>
): Ellipse<S>;
/** Moves the center and turns both end angles by `angle`. */
export function rotated<S extends Space>(shape: Arc<S>, angle: Radian, about?: Point<S>): Arc<S>;
/** A rotated rectangle is no longer axis-aligned, so the result is a polygon. */
export function rotated<S extends Space>(
  shape: Rectangle<S>,
  angle: Radian,
  about?: Point<S>
): Polygon<S>;
export function rotated<S extends Space>(
  shape: Triangle<S>,
  angle: Radian,
  about?: Point<S>
): Triangle<S>;
export function rotated<S extends Space>(
  shape: Polygon<S>,
  angle: Radian,
  about: Point<S>
): Polygon<S>;
export function rotated<S extends Space>(shape: Polygon<S>, angle: Radian): Polygon<S> | undefined;
export function rotated(shape: Shape, angle: Radian, about?: Point): Shape | undefined {
  switch (shape.kind) {
    case "point":
      return about === undefined ? shape : applyToPoint(rotationAbout(angle, about), shape);
    case "vector":
      return applyToVector(rotation2d(angle), shape);
    case "line": {
      const m = rotationAbout(angle, about ?? shape.point);
      return line(applyToPoint(m, shape.point), applyToVector(m, shape.direction));
    }
    case "ray": {
      const m = rotationAbout(angle, about ?? shape.origin);
      return ray(applyToPoint(m, shape.origin), applyToVector(m, shape.direction));
    }
    case "segment": {
      const m = rotationAbout(angle, about ?? segmentMidpoint(shape));
      return segment(applyToPoint(m, shape.start), applyToPoint(m, shape.end));
    }
    case "circle": {
      const m = rotationAbout(angle, about ?? shape.center);
      return circle(applyToPoint(m, shape.center), shape.radius);
    }
    case "ellipse": {
      const m = rotationAbout(angle, about ?? shape.center);
      return ellipse(
        applyToPoint(m, shape.center),
        shape.semiMajor,
        shape.semiMinor,
        addAngles(shape.rotation, angle)
      );
    }
    case "arc": {
      const m = rotationAbout(angle, about ?? shape.center);
      return arc(
        applyToPoint(m, shape.center),
        shape.radius,
        addAngles(shape.startAngle, angle),
        addAngles(shape.endAngle, angle)
      );
    }
    case "rectangle": {
      const m = rotationAbout(angle, about ?? rectangleCenter(shape));
      const corners = rectangleToPolygon(shape).vertices;
      return polygon(shape.space, corners.map((p) => applyToPoint(m, p)));
    }
    case "triangle": {
      const m = rotationAbout(angle, about ?? triangleCentroid(shape));
      return triangle(applyToPoint(m, shape.a), applyToPoint(m, shape.b), applyToPoint(m, shape.c));
    }
    case "polygon": {
      const pivot = about ?? polygonCentroid(shape);
      if (pivot === undefined) return undefined;
      const m = rotationAbout(angle, pivot);
      return polygon(shape.space, shape.vertices.map((p) => applyToPoint(m, p)));
    }
  }
}

// ============================================================================
// Scaling
// ============================================================================

export function scaled<S extends Space>(
  shape: Point<S>,
  factor: number,
  about?: Point<S>
): Point<S>;
export function scaled<S extends Space>(shape: Vector<S>, factor: number): Vector<S>;
export function scaled<S extends Space>(shape: Line<S>, factor: number, about?: Point<S>): Line<S>;
export function scaled<S extends Space>(shape: Ray<S>, factor: number, about?: Point<S>): Ray<S>;
export function scaled<S extends Space>(
  shape: Segment<S>,
  factor: number,
  about?: Point<S>
): Segment<S>;
/** The radius scales by `|factor|`. */
export function scaled<S extends Space>(
  shape: Circle<S>,
  factor: number,
  about?: Point<S>
): Circle<S>;
/** Both semi-axes scale by `|factor|`. */
export function scaled<S extends Space>(
  shape: Ellipse<S>,
  factor: number,
  about?: Point<S>
): Ellipse<S>;
/**
 * The radius scales by `|factor|`; a negative factor reflects the arc
 * through the pivot, turning both end angles by π.
 */
export function scaled<S extends Space>(shape: Arc<S>, factor: number, about?: Point<S>): Arc<S>;
export function scaled<S extends Space>(
  shape: Rectangle<S>,
  factor: number,
  about?: Point<S>
): Rectangle<S>;
export function scaled<S extends Space>(
  shape: Triangle<S>,
  factor: number,
  about?: Point<S>
): Triangle<S>;
export function scaled<S extends Space>(
  shape: Polygon<S>,
  factor: number,
  about: Point<S>
): Polygon<S>;
export function scaled<S extends Space>(shape: Polygon<S>, factor: number): Polygon<S> | undefined;
export function scaled(shape: Shape, factor: number, about?: Point): Shape | undefined {
  switch (shape.kind) {
    case "point":
      return about === undefined ? shape : applyToPoint(scaleAbout(factor, about), shape);
    case "vector":
      return scale(shape, factor);
    case "line": {
      const m = scaleAbout(factor, about ?? shape.point);
      return line(applyToPoint(m, shape.point), applyToVector(m, shape.direction));
    }
    case "ray": {
      const m = scaleAbout(factor, about ?? shape.origin);
      return ray(applyToPoint(m, shape.origin), applyToVector(m, shape.direction));
    }
    case "segment": {
      const m = scaleAbout(factor, about ?? segmentMidpoint(shape));
      return segment(applyToPoint(m, shape.start), applyToPoint(m, shape.end));
    }
    case "circle": {
      const m = scaleAbout(factor, about ?? shape.center);
      return circle(applyToPoint(m, shape.center), Math.abs(factor) * shape.radius);
    }
    case "ellipse": {
      const m = scaleAbout(factor, about ?? shape.center);
      const k = Math.abs(factor);
      return ellipse(
        applyToPoint(m, shape.center),
        k * shape.semiMajor,
        k * shape.semiMinor,
        shape.rotation
      );
    }
    case "arc": {
      const m = scaleAbout(factor, about ?? shape.center);
      const turn = factor < 0 ? Radian.pi : Radian.zero;
      return arc(
        applyToPoint(m, shape.center),
        Math.abs(factor) * shape.radius,
        addAngles(shape.startAngle, turn),
        addAngles(shape.endAngle, turn)
      );
    }
    case "rectangle": {
      const m = scaleAbout(factor, about ?? rectangleCenter(shape));
      return rectangleFromCorners(
        applyToPoint(m, rectangleCorner(shape, "lowerLeft")),
        applyToPoint(m, rectangleCorner(shape, "upperRight"))
      );
    }
    case "triangle": {
      const m = scaleAbout(factor, about ?? triangleCentroid(shape));
      return triangle(applyToPoint(m, shape.a), applyToPoint(m, shape.b), applyToPoint(m, shape.c));
    }
    case "polygon":
      return about === undefined
        ? polygonScaled(shape, factor)
        : polygonScaledAbout(shape, factor, about);
  }
}
