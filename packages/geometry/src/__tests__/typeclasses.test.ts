import { describe, expect, it } from "vitest";
import { cartesian, defineSpace, radians } from "@quantgeo/core";
import {
  point,
  vector,
  origin,
  line,
  ray,
  segment,
  circle,
  ellipse,
  rectangle,
  triangle,
  polygon,
  eqPoint,
  eqVector,
  showPoint,
  showVector,
  showShape,
} from "../index.js";

const C = cartesian;

describe("Eq instances", () => {
  it("compares points within the configured tolerance", () => {
    const eq = eqPoint();
    expect(eq.equals(point(C, 1, 2), point(C, 1, 2 + 1e-12))).toBe(true);
    expect(eq.equals(point(C, 1, 2), point(C, 1, 2.1))).toBe(false);
    expect(eq.notEquals(point(C, 1, 2), point(C, 1, 2.1))).toBe(true);
  });

  it("takes an explicit tolerance", () => {
    const loose = eqVector(0.5);
    expect(loose.equals(vector(C, 1, 1), vector(C, 1.4, 0.6))).toBe(true);
    expect(loose.equals(vector(C, 1, 1), vector(C, 1.6, 1))).toBe(false);
  });
});

describe("Show instances", () => {
  it("shows points and vectors", () => {
    expect(showPoint.show(point(C, 1, 2))).toBe("Point(1, 2)");
    expect(showVector.show(vector(C, -1.5, 2))).toBe("Vector(-1.5, 2)");
  });

  it("shows the snapped value", () => {
    const Pdf = defineSpace("pdf", { quantum: 0.01 });
    expect(showPoint.show(point(Pdf, 1.234, 0))).toBe("Point(1.23, 0)");
  });

  it("shows every shape kind", () => {
    const o = origin(C);
    const p = point(C, 1, 0);
    expect(showShape.show(line(o, vector(C, 1, 1)))).toBe("Line(Point(0, 0), Vector(1, 1))");
    expect(showShape.show(ray(o, vector(C, 0, 1)))).toBe("Ray(Point(0, 0), Vector(0, 1))");
    expect(showShape.show(segment(o, p))).toBe("Segment(Point(0, 0), Point(1, 0))");
    expect(showShape.show(circle(o, 1))).toBe("Circle(Point(0, 0), r=1)");
    expect(showShape.show(ellipse(o, 2, 1, radians(0.5)))).toBe(
      "Ellipse(Point(0, 0), a=2, b=1, rotation=0.5)"
    );
    expect(showShape.show(rectangle(C, 0, 0, 2, 1))).toBe("Rectangle(Point(0, 0), Point(2, 1))");
    expect(showShape.show(triangle(o, p, point(C, 0, 1)))).toBe(
      "Triangle(Point(0, 0), Point(1, 0), Point(0, 1))"
    );
    expect(
      showShape.show(
        polygon(C, [
          [0, 0],
          [1, 0],
          [0, 1],
        ])
      )
    ).toBe("Polygon(Point(0, 0), Point(1, 0), Point(0, 1))");
  });
});
