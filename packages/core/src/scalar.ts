/**
 * Scalar types: the numeric representation a space stores coordinates in.
 *
 * Every coordinate is a JavaScript `number`; a scalar type decides how a
 * computed value is coerced before it is stored. `float64` keeps the value,
 * `float32` rounds it to the nearest single-precision value.
 */

export type ScalarName = "float64" | "float32";

export interface ScalarType<N extends ScalarName = ScalarName> {
  readonly name: N;
  /** Machine epsilon of the representation */
  readonly epsilon: number;
  /** Coerce a computed value into the representation */
  coerce(value: number): number;
}

export const float64: ScalarType<"float64"> = {
  name: "float64",
  epsilon: Number.EPSILON,
  coerce: (value) => value,
};

export const float32: ScalarType<"float32"> = {
  name: "float32",
  epsilon: 2 ** -23,
  coerce: (value) => Math.fround(value),
};
