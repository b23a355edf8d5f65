/**
 * @quantgeo/core: scalar types, coordinate spaces and quantization.
 *
 * This package provides:
 * - Spaces with an optional quantum, and `quantize` to snap values onto it
 * - The Numeric / Eq / Show typeclass interfaces
 * - Angles, tolerance predicates, configuration and logging
 *
 * @packageDocumentation
 */

// Spaces and quantization
export {
  defineSpace,
  cartesian,
  quantize,
  quantizedNumeric,
  ticks,
  isOnGrid,
  isQuantized,
  roundingOf,
  type Space,
  type SpaceOptions,
  type Quantized,
} from "./space.js";

export { float64, float32, type ScalarType, type ScalarName } from "./scalar.js";

export {
  roundHalfAway,
  roundHalfEven,
  roundToInteger,
  isRoundingMode,
  ROUNDING_MODES,
  type RoundingMode,
} from "./rounding.js";

// Angles
export {
  Radian,
  radians,
  degrees,
  toDegrees,
  sin,
  cos,
  atan2,
  addAngles,
  negateAngle,
  normalizeAngle,
} from "./angle.js";

// Tolerance
export { tolerance, isApproxZero, approxEqual } from "./tolerance.js";

// Typeclasses
export {
  makeEq,
  type Numeric,
  type Eq,
  type Show,
} from "./typeclasses.js";

// Configuration, logging, errors
export { config, type QuantgeoConfig } from "./config.js";
export { logger } from "./logger.js";
export {
  SpaceError,
  ConfigError,
  type SpaceErrorReason,
  type ConfigErrorReason,
} from "./errors.js";
