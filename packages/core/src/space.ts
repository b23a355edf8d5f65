/**
 * Coordinate spaces and quantization.
 *
 * A space is identified at compile time by its tag literal type and carries,
 * at runtime, an optional quantum: the spacing of the grid every coordinate
 * in that space snaps to. Values are snapped as `ticks × quantum` with
 * `ticks = round(value / quantum)`, so two computations that land on the same
 * grid point produce identical bits and compare equal with `===`.
 *
 * @example
 * ```typescript
 * const Pdf = defineSpace("pdf", { quantum: 0.01 });
 * const x = quantize(Pdf, 1.234);   // 1.23
 *
 * const pdf = quantizedNumeric(Pdf);
 * pdf.add(quantize(Pdf, 84), quantize(Pdf, 21.8));  // 105.8, re-quantized
 * ```
 */

import { config } from "./config.js";
import { SpaceError } from "./errors.js";
import { roundToInteger, type RoundingMode } from "./rounding.js";
import { float64, type ScalarType } from "./scalar.js";
import type { Numeric } from "./typeclasses.js";

// ============================================================================
// Types
// ============================================================================

/**
 * A coordinate space. `Tag` is the phantom discriminator: shapes from spaces
 * with different tags don't mix.
 */
export interface Space<Tag extends string = string> {
  readonly tag: Tag;
  /** Grid step; `undefined` when the space is unquantized */
  readonly quantum: number | undefined;
  /** Tie-breaking rule; `undefined` defers to the configured default */
  readonly rounding: RoundingMode | undefined;
  readonly scalar: ScalarType;
}

export interface SpaceOptions {
  /** Grid step. Omitted or `0` means values are stored as computed. */
  quantum?: number;
  rounding?: RoundingMode;
  scalar?: ScalarType;
}

declare const spaceBrand: unique symbol;

/**
 * A scalar bound to a space. Only `quantize` produces one, so a value of this
 * type is always a multiple of the space's quantum.
 */
export type Quantized<S extends Space> = number & { readonly [spaceBrand]: S["tag"] };

// ============================================================================
// Constructors
// ============================================================================

/**
 * Define a coordinate space.
 *
 * @throws SpaceError if the tag is empty or the quantum is negative or non-finite
 */
export function defineSpace<Tag extends string>(tag: Tag, options: SpaceOptions = {}): Space<Tag> {
  if (tag.length === 0) {
    throw new SpaceError(tag, "invalid_tag", "Space tag must not be empty");
  }

  const { quantum } = options;
  if (quantum !== undefined && (!Number.isFinite(quantum) || quantum < 0)) {
    throw new SpaceError(
      tag,
      "invalid_quantum",
      `Space "${tag}": quantum must be a finite non-negative number, got ${quantum}`
    );
  }

  return {
    tag,
    quantum: quantum === 0 ? undefined : quantum,
    rounding: options.rounding,
    scalar: options.scalar ?? float64,
  };
}

/** The default unquantized, double-precision space. */
export const cartesian: Space<"cartesian"> = defineSpace("cartesian");

// ============================================================================
// Quantization
// ============================================================================

/** Whether the space snaps values to a grid. */
export function isQuantized(space: Space): boolean {
  return space.quantum !== undefined;
}

/** The rounding mode in effect for a space. */
export function roundingOf(space: Space): RoundingMode {
  return space.rounding ?? config.get("rounding");
}

/**
 * Number of grid steps nearest to `value`. For an unquantized space this is
 * the value itself.
 */
export function ticks(space: Space, value: number): number {
  if (space.quantum === undefined) return value;
  return roundToInteger(value / space.quantum, roundingOf(space));
}

/**
 * Snap a value to the space's grid and coerce it to the space's scalar type.
 * Idempotent: `quantize(s, quantize(s, x)) === quantize(s, x)`.
 */
export function quantize<S extends Space>(space: S, value: number): Quantized<S> {
  if (space.quantum === undefined) {
    return space.scalar.coerce(value) as Quantized<S>;
  }
  const n = ticks(space, value);
  // zero ticks are +0 regardless of the sign of the input
  const snapped = n === 0 ? 0 : n * space.quantum;
  return space.scalar.coerce(snapped) as Quantized<S>;
}

/** Whether a value already sits exactly on the space's grid. */
export function isOnGrid(space: Space, value: number): boolean {
  return quantize(space, value) === value;
}

// ============================================================================
// Numeric instance
// ============================================================================

/**
 * Numeric instance for quantized scalars of a space. Every operation rounds
 * its result back onto the grid.
 */
export function quantizedNumeric<S extends Space>(space: S): Numeric<Quantized<S>> {
  const q = (value: number): Quantized<S> => quantize(space, value);
  return {
    add: (a, b) => q(a + b),
    sub: (a, b) => q(a - b),
    mul: (a, b) => q(a * b),
    div: (a, b) => q(a / b),
    pow: (a, b) => q(a ** b),
    negate: (a) => q(-a),
    abs: (a) => q(Math.abs(a)),
    signum: (a) => q(Math.sign(a)),
    fromNumber: (n) => q(n),
    toNumber: (a) => a,
    zero: () => q(0),
    one: () => q(1),
  };
}
