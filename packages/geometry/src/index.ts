/**
 * @quantgeo/geometry: 2D shapes over quantized coordinate spaces.
 *
 * Shapes are readonly plain objects tagged with the space they live in, so
 * mixing shapes from different spaces is a compile-time error. Every
 * coordinate a constructor or operation produces is snapped onto the
 * space's grid.
 *
 * @packageDocumentation
 */

export type {
  Point,
  Vector,
  Line,
  Ray,
  Segment,
  Circle,
  Ellipse,
  Arc,
  Rectangle,
  EdgeInsets,
  Triangle,
  Polygon,
  Shape,
  ShapeKind,
  Cardinal,
  Corner,
  Transform,
} from "./types.js";

export {
  point,
  vector,
  origin,
  line,
  lineThrough,
  ray,
  rayThrough,
  rayToward,
  segment,
  circle,
  unitCircle,
  ellipse,
  ellipseFromCircle,
  arc,
  semicircle,
  quarterCircle,
  fullCircleArc,
  rectangle,
  rectangleFromBounds,
  rectangleFromCorners,
  polygon,
  triangle,
} from "./constructors.js";

export {
  translate,
  displacement,
  addVec,
  subVec,
  scale,
  negate,
  dot,
  cross,
  magnitude,
  magnitudeSquared,
  normalize,
  distance,
  distanceSquared,
  midpoint,
  lerp,
  angleBetween,
  perpendicular,
} from "./operations.js";

export {
  lineUnitDirection,
  pointOnLine,
  lineDistance,
  lineParameter,
  lineProjection,
  lineReflection,
  lineContains,
} from "./line.js";

export {
  rayUnitDirection,
  rayLine,
  pointOnRay,
  rayContains,
  rayClosestPoint,
  rayDistance,
} from "./ray.js";

export {
  segmentVector,
  segmentLength,
  segmentLengthSquared,
  segmentMidpoint,
  pointOnSegment,
  segmentReversed,
  segmentLine,
  segmentClosestPoint,
  segmentDistance,
  segmentContains,
} from "./segment.js";

export {
  circleDiameter,
  circleCircumference,
  circleArea,
  circleBoundingBox,
  circleContains,
  circleContainsInterior,
  circleContainsCircle,
  pointOnCircle,
  circleTangent,
  circleClosestPoint,
  circleFromEllipse,
} from "./circle.js";

export {
  ellipseMajorAxis,
  ellipseMinorAxis,
  ellipseEccentricity,
  ellipseFocalDistance,
  ellipseFoci,
  ellipseArea,
  ellipsePerimeter,
  ellipseIsCircle,
  pointOnEllipse,
  ellipseTangent,
  ellipseContains,
  ellipseBoundingBox,
} from "./ellipse.js";

export {
  arcSweep,
  arcIsCounterClockwise,
  arcIsFullCircle,
  arcCoversAngle,
  arcStartPoint,
  arcEndPoint,
  arcMidPoint,
  pointOnArc,
  arcTangent,
  arcLength,
  arcBoundingBox,
  arcContains,
  arcReversed,
  arcCircle,
} from "./arc.js";

export {
  edgeInsets,
  uniformInsets,
  symmetricInsets,
  zeroInsets,
  combineInsets,
  mapInsets,
} from "./insets.js";

export {
  rectangleWidth,
  rectangleHeight,
  rectangleIsValid,
  rectangleStandardized,
  minX,
  maxX,
  minY,
  maxY,
  rectangleArea,
  rectanglePerimeter,
  rectangleOrigin,
  rectangleCorner,
  rectangleCenter,
  rectangleContains,
  rectangleContainsRectangle,
  rectanglesIntersect,
  rectangleUnion,
  rectangleIntersection,
  rectangleInset,
  rectangleWith,
  rectangleToPolygon,
  type RectangleBounds,
} from "./rectangle.js";

export {
  triangleVertices,
  triangleSignedDoubleArea,
  triangleArea,
  trianglePerimeter,
  triangleCentroid,
  triangleBarycentric,
  triangleContains,
  triangleCircumcircle,
  triangleIncircle,
  triangleBoundingBox,
  triangleToPolygon,
  type Barycentric,
} from "./triangle.js";

export {
  regularPolygon,
  polygonVertexCount,
  polygonIsValid,
  polygonEdges,
  polygonSignedDoubleArea,
  polygonArea,
  polygonPerimeter,
  polygonCentroid,
  polygonBoundingBox,
  polygonIsConvex,
  polygonIsCounterClockwise,
  polygonIsClockwise,
  polygonReversed,
  polygonIsOnBoundary,
  polygonContains,
  polygonContainsInterior,
  polygonWindingNumber,
  polygonFanTriangulate,
  polygonTriangulate,
  polygonTranslated,
  polygonScaledAbout,
  polygonScaled,
  polygonTransformed,
} from "./polygon.js";

export {
  intersectRayLine,
  intersectRaySegment,
  intersectRayRay,
  intersectLines,
  intersectSegments,
  intersectRayCircle,
  intersectLineCircle,
  intersectSegmentCircle,
  circlesIntersect,
  intersectCircles,
  intersectRayPolygon,
  intersectLinePolygon,
} from "./intersection.js";

export {
  mapPoint,
  mapVector,
  mapLine,
  mapRay,
  mapSegment,
  mapCircle,
  mapEllipse,
  mapArc,
  mapRectangle,
  mapTriangle,
  mapPolygon,
  mapShape,
  type ScalarMap,
} from "./map.js";

export {
  rotation2d,
  translation2d,
  scale2d,
  shear2d,
  identity2d,
  compose,
  inverse,
  determinant,
  rotationAbout,
  scaleAbout,
  applyToPoint,
  applyToVector,
} from "./transforms.js";

export { translated, rotated, scaled } from "./transformations.js";

export { eqPoint, eqVector, showPoint, showVector, showShape } from "./typeclasses.js";
