/**
 * Rounding modes for snapping values to integer tick counts.
 *
 * Only ties (values exactly halfway between two integers) depend on the mode:
 * - "half-away": ties round away from zero (2.5 → 3, -2.5 → -3)
 * - "half-even": ties round to the nearest even integer (2.5 → 2, 3.5 → 4)
 */

export type RoundingMode = "half-away" | "half-even";

export const ROUNDING_MODES: readonly RoundingMode[] = ["half-away", "half-even"];

export function isRoundingMode(value: unknown): value is RoundingMode {
  return ROUNDING_MODES.some((mode) => mode === value);
}

/** Round to the nearest integer, ties away from zero. */
export function roundHalfAway(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/** Round to the nearest integer, ties to even. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Round to the nearest integer using the given mode. Non-finite values pass through. */
export function roundToInteger(value: number, mode: RoundingMode): number {
  if (!Number.isFinite(value)) return value;
  return mode === "half-even" ? roundHalfEven(value) : roundHalfAway(value);
}
