/**
 * Typeclass interfaces shared by the geometry packages.
 *
 * Instances are plain objects; pass them explicitly where an algorithm is
 * generic over the scalar it works with.
 */

// ============================================================================
// Numeric
// Types supporting basic arithmetic.
// ============================================================================

/**
 * Numeric typeclass - types supporting basic arithmetic operations.
 *
 * This is the Ring abstraction (plus division and power): add, sub, mul with
 * identity elements.
 */
export interface Numeric<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  div(a: A, b: A): A;
  pow(a: A, b: A): A;
  negate(a: A): A;
  abs(a: A): A;
  signum(a: A): A;
  fromNumber(n: number): A;
  toNumber(a: A): number;
  zero(): A;
  one(): A;
}

// ============================================================================
// Eq
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

/** Build an Eq instance from an equality function. */
export function makeEq<A>(equals: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals,
    notEquals: (a, b) => !equals(a, b),
  };
}

// ============================================================================
// Show
// ============================================================================

/**
 * Show typeclass - human-readable rendering.
 */
export interface Show<A> {
  show(a: A): string;
}
