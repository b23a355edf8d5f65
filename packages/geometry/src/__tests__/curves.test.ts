import { describe, expect, it } from "vitest";
import { Radian, cartesian, defineSpace } from "@quantgeo/core";
import {
  point,
  origin,
  circle,
  unitCircle,
  ellipse,
  ellipseFromCircle,
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
} from "../index.js";

const C = cartesian;

describe("Circle", () => {
  const c = circle(origin(C), 2);

  it("takes a negative radius by magnitude", () => {
    expect(circle(origin(C), -2).radius).toBe(2);
  });

  it("snaps its radius onto the grid", () => {
    const Quarter = defineSpace("quarter", { quantum: 0.25 });
    expect(circle(origin(Quarter), 1.1).radius).toBe(1);
  });

  it("computes metrics", () => {
    expect(circleDiameter(c)).toBe(4);
    expect(circleCircumference(c)).toBe(4 * Math.PI);
    expect(circleArea(c)).toBe(4 * Math.PI);
  });

  it("computes its bounding box", () => {
    expect(circleBoundingBox(c)).toMatchObject({ llx: -2, lly: -2, urx: 2, ury: 2 });
  });

  it("tests containment", () => {
    expect(circleContains(c, point(C, 2, 0))).toBe(true);
    expect(circleContainsInterior(c, point(C, 2, 0))).toBe(false);
    expect(circleContains(c, point(C, 1, 1))).toBe(true);
    expect(circleContainsInterior(c, point(C, 1, 1))).toBe(true);
    expect(circleContains(c, point(C, 2, 2))).toBe(false);
  });

  it("tests whether one circle holds another", () => {
    const outer = circle(origin(C), 3);
    expect(circleContainsCircle(outer, circle(point(C, 1, 0), 1))).toBe(true);
    expect(circleContainsCircle(outer, circle(point(C, 2.5, 0), 1))).toBe(false);
  });

  it("evaluates points and tangents by angle", () => {
    const top = pointOnCircle(c, Radian.halfPi);
    expect(top.x).toBeCloseTo(0, 12);
    expect(top.y).toBeCloseTo(2, 12);

    const t = circleTangent(unitCircle(C), Radian.zero);
    expect(t.dx).toBeCloseTo(0, 12);
    expect(t.dy).toBe(1);
  });

  it("finds the closest point on the circle", () => {
    const p = circleClosestPoint(c, point(C, 3, 4));
    expect(p.x).toBeCloseTo(1.2, 12);
    expect(p.y).toBeCloseTo(1.6, 12);
    expect(circleClosestPoint(c, origin(C))).toMatchObject({ x: 2, y: 0 });
  });
});

describe("Ellipse", () => {
  const e = ellipse(origin(C), 5, 3);

  it("computes axes, foci and eccentricity", () => {
    expect(ellipseMajorAxis(e)).toBe(10);
    expect(ellipseMinorAxis(e)).toBe(6);
    expect(ellipseFocalDistance(e)).toBe(4);
    expect(ellipseEccentricity(e)).toBeCloseTo(0.8, 12);
    const [f1, f2] = ellipseFoci(e);
    expect([f1.x, f1.y]).toEqual([-4, 0]);
    expect([f2.x, f2.y]).toEqual([4, 0]);
  });

  it("computes area and perimeter", () => {
    expect(ellipseArea(e)).toBeCloseTo(15 * Math.PI, 12);
    expect(ellipsePerimeter(e)).toBeCloseTo(25.527, 3);
  });

  it("swaps axes so the major axis is the longer one", () => {
    const tall = ellipse(origin(C), 1, 2);
    expect(tall.semiMajor).toBe(2);
    expect(tall.semiMinor).toBe(1);
    expect(tall.rotation).toBe(Math.PI / 2);
  });

  it("evaluates points and tangents by eccentric anomaly", () => {
    const flat = ellipse(origin(C), 2, 1);
    expect(pointOnEllipse(flat, Radian.zero)).toMatchObject({ x: 2, y: 0 });
    const top = pointOnEllipse(flat, Radian.halfPi);
    expect(top.x).toBeCloseTo(0, 12);
    expect(top.y).toBeCloseTo(1, 12);
    const t = ellipseTangent(flat, Radian.zero);
    expect(t.dx).toBeCloseTo(0, 12);
    expect(t.dy).toBeCloseTo(1, 12);
  });

  it("tests containment", () => {
    const flat = ellipse(origin(C), 2, 1);
    expect(ellipseContains(flat, point(C, 1.9, 0))).toBe(true);
    expect(ellipseContains(flat, point(C, 2, 0))).toBe(true);
    expect(ellipseContains(flat, point(C, 0, 1.1))).toBe(false);
  });

  it("tests containment in its own rotated frame", () => {
    const upright = ellipse(origin(C), 2, 1, Radian.halfPi);
    expect(ellipseContains(upright, point(C, 0, 1.9))).toBe(true);
    expect(ellipseContains(upright, point(C, 1.9, 0))).toBe(false);
  });

  it("computes its bounding box", () => {
    const box = ellipseBoundingBox(ellipse(origin(C), 2, 1));
    expect(box).toMatchObject({ llx: -2, lly: -1, urx: 2, ury: 1 });
  });
});

describe("circle and ellipse duality", () => {
  const c = circle(origin(C), 3);
  const e = ellipseFromCircle(c);

  it("views a circle as an ellipse with equal axes", () => {
    expect(ellipseIsCircle(e)).toBe(true);
    expect(ellipseEccentricity(e)).toBe(0);
    expect(ellipseFoci(e)).toEqual([origin(C), origin(C)]);
  });

  it("gives the circle's circumference as the perimeter", () => {
    expect(ellipsePerimeter(e)).toBe(circleCircumference(c));
  });

  it("converts back to the same circle", () => {
    expect(circleFromEllipse(e)).toEqual(c);
  });

  it("has no circle for an ellipse with distinct axes", () => {
    expect(ellipseIsCircle(ellipse(origin(C), 5, 3))).toBe(false);
    expect(circleFromEllipse(ellipse(origin(C), 5, 3))).toBeUndefined();
  });
});
