import { describe, expect, it } from "vitest";
import { Radian, cartesian, defineSpace, isOnGrid, radians } from "@quantgeo/core";
import {
  point,
  vector,
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
} from "../index.js";

const C = cartesian;
const EPSILON = 10;

describe("rotation", () => {
  it("rotates 90 degrees", () => {
    const p = applyToPoint(rotation2d(Radian.halfPi), point(C, 1, 0));
    expect(p.x).toBeCloseTo(0, EPSILON);
    expect(p.y).toBeCloseTo(1, EPSILON);
  });

  it("rotates 180 degrees", () => {
    const p = applyToPoint(rotation2d(Radian.pi), point(C, 1, 0));
    expect(p.x).toBeCloseTo(-1, EPSILON);
    expect(p.y).toBeCloseTo(0, EPSILON);
  });

  it("rotates a full circle back to the start", () => {
    const p = applyToPoint(rotation2d(Radian.twoPi), point(C, 3, 4));
    expect(p.x).toBeCloseTo(3, EPSILON);
    expect(p.y).toBeCloseTo(4, EPSILON);
  });

  it("rotates about a pivot", () => {
    const p = applyToPoint(rotationAbout(Radian.halfPi, point(C, 1, 1)), point(C, 2, 1));
    expect(p.x).toBeCloseTo(1, EPSILON);
    expect(p.y).toBeCloseTo(2, EPSILON);
  });
});

describe("translation", () => {
  it("translates a point", () => {
    const p = applyToPoint(translation2d(3, 5), point(C, 1, 2));
    expect([p.x, p.y]).toEqual([4, 7]);
  });

  it("does not move a vector", () => {
    const v = applyToVector(translation2d(3, 5), vector(C, 1, 2));
    expect([v.dx, v.dy]).toEqual([1, 2]);
  });
});

describe("scale and shear", () => {
  it("scales each axis", () => {
    const p = applyToPoint(scale2d(2, 3), point(C, 1, 1));
    expect([p.x, p.y]).toEqual([2, 3]);
  });

  it("scales about a pivot", () => {
    const p = applyToPoint(scaleAbout(2, point(C, 1, 1)), point(C, 0, 0));
    expect([p.x, p.y]).toEqual([-1, -1]);
  });

  it("shears along x", () => {
    const p = applyToPoint(shear2d(1, 0), point(C, 1, 1));
    expect([p.x, p.y]).toEqual([2, 1]);
  });
});

describe("composition", () => {
  it("applies the first transform first", () => {
    const m = compose(translation2d(1, 0), scale2d(2));
    const p = applyToPoint(m, point(C, 1, 1));
    expect([p.x, p.y]).toEqual([4, 2]);
  });

  it("leaves points alone under the identity", () => {
    const p = applyToPoint(identity2d(), point(C, 3, -2));
    expect([p.x, p.y]).toEqual([3, -2]);
  });

  it("computes the determinant of the linear part", () => {
    expect(determinant(scale2d(2, 3))).toBe(6);
    expect(determinant(translation2d(4, 5))).toBe(1);
  });
});

describe("inverse", () => {
  it("undoes a translation", () => {
    const inv = inverse(translation2d(3, 5));
    expect(inv).toBeDefined();
    if (inv === undefined) return;
    const p = applyToPoint(inv, point(C, 4, 7));
    expect([p.x, p.y]).toEqual([1, 2]);
  });

  it("composes with the original to the identity", () => {
    const m = compose(rotation2d(radians(0.7)), translation2d(2, -1));
    const inv = inverse(m);
    if (inv === undefined) throw new Error("expected an invertible transform");
    const id = compose(m, inv);
    identity2d().forEach((value, i) => expect(id[i]).toBeCloseTo(value, EPSILON));
  });

  it("is undefined for a singular matrix", () => {
    expect(inverse(scale2d(0, 1))).toBeUndefined();
  });
});

describe("quantized spaces", () => {
  it("snaps transformed points onto the grid", () => {
    const Quarter = defineSpace("quarter", { quantum: 0.25 });
    const p = applyToPoint(rotation2d(radians(0.1)), point(Quarter, 1, 0));
    expect(isOnGrid(Quarter, p.x)).toBe(true);
    expect(isOnGrid(Quarter, p.y)).toBe(true);
    expect(p.x).toBe(1);
    expect(p.y).toBe(0);
  });
});
