/** Reason codes for invalid space definitions. */
export type SpaceErrorReason = "invalid_quantum" | "invalid_tag";

/** Error thrown when a coordinate space is defined with invalid parameters. */
export class SpaceError extends Error {
  constructor(
    readonly tag: string,
    readonly reason: SpaceErrorReason,
    message: string
  ) {
    super(message);
    this.name = "SpaceError";
  }
}

/** Reason codes for invalid configuration values. */
export type ConfigErrorReason = "invalid_tolerance" | "invalid_rounding" | "invalid_file";

/** Error thrown when a configuration source holds an invalid value. */
export class ConfigError extends Error {
  constructor(
    readonly key: string,
    readonly reason: ConfigErrorReason,
    message: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
