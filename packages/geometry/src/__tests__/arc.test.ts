import { describe, expect, it } from "vitest";
import { Radian, cartesian, defineSpace, quantize, radians } from "@quantgeo/core";
import {
  point,
  vector,
  origin,
  arc,
  semicircle,
  quarterCircle,
  fullCircleArc,
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
  mapArc,
  mapShape,
  translated,
  rotated,
  scaled,
  showShape,
  type Rectangle,
} from "../index.js";

const C = cartesian;
const Half = defineSpace("half", { quantum: 0.5 });

const bounds = (r: Rectangle): number[] => [r.llx, r.lly, r.urx, r.ury];

describe("construction", () => {
  it("takes a negative radius by magnitude", () => {
    expect(arc(origin(C), -3, Radian.zero, Radian.pi).radius).toBe(3);
  });

  it("snaps its radius onto the grid", () => {
    expect(arc(origin(Half), 2.2, Radian.zero, Radian.pi).radius).toBe(2);
  });

  it("builds the common arcs", () => {
    expect(semicircle(origin(C), 1).endAngle).toBe(Math.PI);
    expect(quarterCircle(origin(C), 1, Radian.pi).endAngle).toBe(Math.PI * 1.5);
    const full = fullCircleArc(origin(C), 1);
    expect([full.startAngle, full.endAngle]).toEqual([0, Math.PI * 2]);
  });
});

describe("sweep", () => {
  const quarter = quarterCircle(origin(C), 10);

  it("is the signed span from start to end", () => {
    expect(arcSweep(quarter)).toBe(Math.PI / 2);
    expect(arcSweep(arcReversed(quarter))).toBe(-Math.PI / 2);
  });

  it("tells the direction of travel", () => {
    expect(arcIsCounterClockwise(quarter)).toBe(true);
    expect(arcIsCounterClockwise(arcReversed(quarter))).toBe(false);
  });

  it("recognizes a full circle", () => {
    expect(arcIsFullCircle(quarter)).toBe(false);
    expect(arcIsFullCircle(fullCircleArc(origin(C), 1))).toBe(true);
    expect(arcIsFullCircle(arc(origin(C), 1, radians(1), radians(1 - 3 * Math.PI)))).toBe(true);
  });

  it("covers angles across the positive x-axis", () => {
    const east = arc(origin(C), 1, radians(-Math.PI / 4), radians(Math.PI / 4));
    expect(arcCoversAngle(east, Radian.zero)).toBe(true);
    expect(arcCoversAngle(east, radians(2 * Math.PI - 0.1))).toBe(true);
    expect(arcCoversAngle(east, Radian.halfPi)).toBe(false);
  });

  it("covers angles clockwise for a clockwise arc", () => {
    const cw = arcReversed(quarter);
    expect(arcCoversAngle(cw, radians(0.5))).toBe(true);
    expect(arcCoversAngle(cw, radians(2))).toBe(false);
  });
});

describe("points", () => {
  const quarter = quarterCircle(origin(Half), 10);

  it("finds the endpoints on the grid", () => {
    const start = arcStartPoint(quarter);
    const end = arcEndPoint(quarter);
    expect([start.x, start.y]).toEqual([10, 0]);
    expect([end.x, end.y]).toEqual([0, 10]);
  });

  it("finds the midpoint", () => {
    const mid = arcMidPoint(quarter);
    expect([mid.x, mid.y]).toEqual([7, 7]);
    expect(pointOnArc(quarter, 0.5)).toEqual(mid);
  });

  it("interpolates along the arc", () => {
    const q = quarterCircle(origin(C), 10);
    const p = pointOnArc(q, 1 / 3);
    expect(p.x).toBeCloseTo(10 * Math.cos(Math.PI / 6), 12);
    expect(p.y).toBeCloseTo(5, 12);
  });

  it("points the tangent the way the arc travels", () => {
    const q = quarterCircle(origin(C), 10);
    const ccw = arcTangent(q, 0);
    expect(ccw.dx).toBeCloseTo(0, 12);
    expect(ccw.dy).toBe(1);

    const cw = arcTangent(arcReversed(q), 0);
    expect(cw.dx).toBe(1);
    expect(cw.dy).toBeCloseTo(0, 12);
  });
});

describe("metrics", () => {
  it("measures the length along the arc", () => {
    expect(arcLength(quarterCircle(origin(C), 10))).toBeCloseTo(5 * Math.PI, 12);
    expect(arcLength(arcReversed(semicircle(origin(C), 2)))).toBeCloseTo(2 * Math.PI, 12);
  });

  it("bounds a quarter arc by its endpoints", () => {
    expect(bounds(arcBoundingBox(quarterCircle(origin(Half), 10)))).toEqual([0, 0, 10, 10]);
  });

  it("widens the bounds where the arc crosses an axis", () => {
    const east = arc(origin(Half), 10, radians(-Math.PI / 4), radians(Math.PI / 4));
    expect(bounds(arcBoundingBox(east))).toEqual([7, -7, 10, 7]);

    const lower = semicircle(origin(Half), 10, Radian.pi);
    expect(bounds(arcBoundingBox(lower))).toEqual([-10, -10, 10, 0]);
  });

  it("bounds a full circle by the circle", () => {
    const full = fullCircleArc(point(Half, 1, 1), 2);
    expect(bounds(arcBoundingBox(full))).toEqual([-1, -1, 3, 3]);
  });
});

describe("containment", () => {
  const quarter = quarterCircle(origin(C), 10);

  it("accepts points on the arc", () => {
    expect(arcContains(quarter, point(C, 6, 8))).toBe(true);
    expect(arcContains(quarter, point(C, 10, 0))).toBe(true);
    expect(arcContains(quarter, point(C, 0, 10))).toBe(true);
  });

  it("rejects points off the circle or outside the sweep", () => {
    expect(arcContains(quarter, point(C, 3, 4))).toBe(false);
    expect(arcContains(quarter, point(C, -6, 8))).toBe(false);
  });

  it("follows a clockwise arc", () => {
    const cw = arcReversed(quarter);
    expect(arcContains(cw, point(C, 6, 8))).toBe(true);
    expect(arcContains(cw, point(C, -6, 8))).toBe(false);
  });

  it("contains its own computed endpoints", () => {
    const a = arc(origin(C), 10, radians(Math.PI / 3), radians((2 * Math.PI) / 3));
    expect(arcContains(a, arcStartPoint(a))).toBe(true);
    expect(arcContains(a, arcEndPoint(a))).toBe(true);
  });
});

describe("derived shapes", () => {
  it("reverses the direction", () => {
    const a = arc(point(C, 1, 2), 3, radians(0.5), radians(2));
    const r = arcReversed(a);
    expect([r.startAngle, r.endAngle]).toEqual([2, 0.5]);
    expect(r.center).toBe(a.center);
    expect(r.radius).toBe(3);
  });

  it("gives the underlying circle", () => {
    const c = arcCircle(quarterCircle(point(C, 1, 2), 4));
    expect(c.kind).toBe("circle");
    expect(c.radius).toBe(4);
    expect([c.center.x, c.center.y]).toEqual([1, 2]);
  });
});

describe("transformations", () => {
  const quarter = quarterCircle(origin(C), 10);

  it("translates the center", () => {
    const moved = translated(quarter, vector(C, 1, 2));
    expect([moved.center.x, moved.center.y]).toEqual([1, 2]);
    expect([moved.startAngle, moved.endAngle]).toEqual([0, Math.PI / 2]);
  });

  it("turns both angles when rotated about its center", () => {
    const turned = rotated(quarter, Radian.halfPi);
    expect(turned.center.x).toBeCloseTo(0, 12);
    expect(turned.center.y).toBeCloseTo(0, 12);
    expect(turned.startAngle).toBe(Math.PI / 2);
    expect(turned.endAngle).toBe(Math.PI);
  });

  it("moves the center when rotated about another point", () => {
    const turned = rotated(quarterCircle(point(C, 1, 0), 1), Radian.pi, origin(C));
    expect(turned.center.x).toBeCloseTo(-1, 12);
    expect(turned.center.y).toBeCloseTo(0, 12);
  });

  it("scales the radius", () => {
    expect(scaled(quarter, 2).radius).toBe(20);
  });

  it("reflects through the pivot for a negative factor", () => {
    const flipped = scaled(quarter, -1, point(C, 1, 0));
    expect(flipped.center.x).toBeCloseTo(2, 12);
    expect(flipped.center.y).toBeCloseTo(0, 12);
    expect(flipped.radius).toBe(10);
    expect(flipped.startAngle).toBe(Math.PI);
    expect(flipped.endAngle).toBeCloseTo(1.5 * Math.PI, 12);

    const start = arcStartPoint(flipped);
    expect(start.x).toBeCloseTo(-8, 12);
    expect(start.y).toBeCloseTo(0, 12);
  });
});

describe("mapping", () => {
  const Pdf = defineSpace("pdf", { quantum: 0.01 });
  const Mm = defineSpace("mm", { quantum: 0.1 });
  const toMm = (pt: number): number => (pt * 25.4) / 72;

  it("maps the center and radius, keeping the angles", () => {
    const a = arc(point(Pdf, 72, 36), 18, radians(0.25), radians(1.5));
    const mapped = mapArc(a, toMm, Mm);
    expect(mapped.space).toBe(Mm);
    expect(mapped.center.x).toBe(quantize(Mm, toMm(a.center.x)));
    expect(mapped.center.y).toBe(quantize(Mm, toMm(a.center.y)));
    expect(mapped.radius).toBe(quantize(Mm, toMm(a.radius)));
    expect([mapped.startAngle, mapped.endAngle]).toEqual([0.25, 1.5]);
  });

  it("maps the radius as stored", () => {
    expect(mapArc(quarterCircle(origin(C), 10), (v) => -v).radius).toBe(-10);
  });

  it("dispatches through mapShape", () => {
    expect(mapShape(quarterCircle(origin(Pdf), 72), toMm, Mm).kind).toBe("arc");
  });
});

describe("showShape", () => {
  it("renders an arc", () => {
    expect(showShape.show(quarterCircle(origin(C), 10))).toBe(
      `Arc(Point(0, 0), r=10, from=0, to=${Math.PI / 2})`
    );
  });
});
