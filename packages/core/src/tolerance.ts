/**
 * Approximate comparisons. Every geometric predicate in quantgeo goes through
 * these, against the configured tolerance (1e-10 unless overridden).
 */

import { config } from "./config.js";

/** The configured absolute epsilon. */
export function tolerance(): number {
  return config.get("tolerance");
}

export function isApproxZero(value: number, epsilon: number = tolerance()): boolean {
  return Math.abs(value) <= epsilon;
}

export function approxEqual(a: number, b: number, epsilon: number = tolerance()): boolean {
  return Math.abs(a - b) <= epsilon;
}
