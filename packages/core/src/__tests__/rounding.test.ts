import { describe, expect, it } from "vitest";
import {
  roundHalfAway,
  roundHalfEven,
  roundToInteger,
  isRoundingMode,
  ROUNDING_MODES,
} from "../index.js";

describe("roundHalfAway", () => {
  it("rounds ties away from zero", () => {
    expect(roundHalfAway(2.5)).toBe(3);
    expect(roundHalfAway(-2.5)).toBe(-3);
  });

  it("rounds non-ties to the nearest integer", () => {
    expect(roundHalfAway(2.4)).toBe(2);
    expect(roundHalfAway(-2.6)).toBe(-3);
  });
});

describe("roundHalfEven", () => {
  it("rounds ties to the even neighbour", () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(-2.5)).toBe(-2);
    expect(roundHalfEven(-3.5)).toBe(-4);
  });

  it("rounds non-ties to the nearest integer", () => {
    expect(roundHalfEven(2.6)).toBe(3);
    expect(roundHalfEven(-2.4)).toBe(-2);
  });
});

describe("roundToInteger", () => {
  it("dispatches on the mode", () => {
    expect(roundToInteger(0.5, "half-away")).toBe(1);
    expect(roundToInteger(0.5, "half-even")).toBe(0);
  });

  it("passes non-finite values through", () => {
    expect(roundToInteger(NaN, "half-away")).toBeNaN();
    expect(roundToInteger(Infinity, "half-even")).toBe(Infinity);
  });
});

describe("isRoundingMode", () => {
  it("accepts the two modes only", () => {
    expect(isRoundingMode("half-away")).toBe(true);
    expect(isRoundingMode("half-even")).toBe(true);
    expect(isRoundingMode("half-up")).toBe(false);
    expect(isRoundingMode(1)).toBe(false);
  });

  it("recognizes every listed mode", () => {
    expect(ROUNDING_MODES.filter((mode) => isRoundingMode(mode))).toEqual([
      "half-away",
      "half-even",
    ]);
  });
});
