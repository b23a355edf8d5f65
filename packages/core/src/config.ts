/**
 * Unified Configuration System
 *
 * Configuration is loaded lazily, on first access, from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: QUANTGEO_* (for CI overrides)
 * 3. Config files: .quantgeorc, quantgeo.config.js, package.json "quantgeo" key, etc.
 * 4. Defaults (lowest priority)
 *
 * The lazy load never throws: an invalid value in a config file or in the
 * environment is reported with a warning and the default is kept, so
 * geometric queries can't fail on configuration. `config.load()` reads the
 * same sources eagerly and throws `ConfigError` instead.
 *
 * @example
 * ```typescript
 * import { config } from "@quantgeo/core";
 *
 * config.get("tolerance")               // → 1e-10
 * config.set({ rounding: "half-even" });
 * ```
 */

import { cosmiconfigSync, type CosmiconfigResult } from "cosmiconfig";
import { ConfigError } from "./errors.js";
import { isRoundingMode, type RoundingMode } from "./rounding.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Full quantgeo configuration schema.
 */
export interface QuantgeoConfig {
  /** Enable debug logging */
  debug: boolean;
  /** Absolute epsilon used by every approximate geometric predicate */
  tolerance: number;
  /** Rounding mode for spaces that don't declare their own */
  rounding: RoundingMode;
}

const DEFAULTS: QuantgeoConfig = {
  debug: false,
  tolerance: 1e-10,
  rounding: "half-away",
};

// ============================================================================
// Global State
// ============================================================================

let configStore: QuantgeoConfig = { ...DEFAULTS };
let overrides: Partial<QuantgeoConfig> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

/** Strict loads throw the first error; lenient loads warn and skip the value. */
type ErrorHandler = (error: ConfigError) => void;

const throwError: ErrorHandler = (error) => {
  throw error;
};

const warnError: ErrorHandler = (error) => {
  console.warn(`[quantgeo] ${error.message}; using the default`);
};

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate an untyped config source (file contents or parsed env) into a
 * partial config. Unknown keys are ignored; invalid values go to `onError`
 * and are left out.
 */
function validate(
  raw: Record<string, unknown>,
  source: string,
  onError: ErrorHandler
): Partial<QuantgeoConfig> {
  const result: Partial<QuantgeoConfig> = {};

  if (raw.debug !== undefined) {
    result.debug = raw.debug === true || raw.debug === 1 || raw.debug === "true";
  }

  if (raw.tolerance !== undefined) {
    const tolerance = typeof raw.tolerance === "string" ? Number(raw.tolerance) : raw.tolerance;
    if (typeof tolerance !== "number" || !Number.isFinite(tolerance) || tolerance < 0) {
      onError(
        new ConfigError(
          "tolerance",
          "invalid_tolerance",
          `${source}: tolerance must be a finite non-negative number, got ${String(raw.tolerance)}`
        )
      );
    } else {
      result.tolerance = tolerance;
    }
  }

  if (raw.rounding !== undefined) {
    if (!isRoundingMode(raw.rounding)) {
      onError(
        new ConfigError(
          "rounding",
          "invalid_rounding",
          `${source}: rounding must be "half-away" or "half-even", got ${String(raw.rounding)}`
        )
      );
    } else {
      result.rounding = raw.rounding;
    }
  }

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   QUANTGEO_DEBUG=1              → { debug: true }
 *   QUANTGEO_TOLERANCE=1e-9       → { tolerance: 1e-9 }
 *   QUANTGEO_ROUNDING=half-even   → { rounding: "half-even" }
 */
function loadConfigFromEnv(onError: ErrorHandler): Partial<QuantgeoConfig> {
  const PREFIX = "QUANTGEO_";
  const raw: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const name = key.slice(PREFIX.length).toLowerCase();
    if (value === "1" || value === "true") {
      raw[name] = name === "tolerance" ? value : true;
    } else if (value === "0" || value === "false" || value === "") {
      raw[name] = name === "tolerance" ? value : false;
    } else {
      raw[name] = value;
    }
  }

  return validate(raw, "environment", onError);
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "quantgeo";

/**
 * Load configuration from the config file in `searchFrom` (the working
 * directory by default).
 */
function loadConfigFromFiles(onError: ErrorHandler): Partial<QuantgeoConfig> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  let result: CosmiconfigResult;
  try {
    result = explorer.search(searchFrom);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    onError(new ConfigError("file", "invalid_file", `config file could not be read: ${message}`));
    return {};
  }
  if (!result || result.isEmpty) return {};

  const contents: unknown = result.config;
  if (!isRecord(contents)) {
    onError(
      new ConfigError("file", "invalid_file", `${result.filepath}: expected a configuration object`)
    );
    return {};
  }

  configFilePath = result.filepath;
  return validate(contents, result.filepath, onError);
}

// ============================================================================
// Config Initialization
// ============================================================================

function readSources(onError: ErrorHandler): void {
  configFilePath = undefined;
  const fileConfig = loadConfigFromFiles(onError);
  const envConfig = loadConfigFromEnv(onError);

  // Merge: defaults < fileConfig < envConfig < overrides
  configStore = { ...DEFAULTS, ...fileConfig, ...envConfig, ...overrides };
  configLoaded = true;
}

/**
 * Initialize configuration from all sources on first access.
 */
function initializeConfig(): void {
  if (configLoaded) return;
  readSources(warnError);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Read the config file and environment now, searching for the file in
 * `directory` (the working directory by default). Later lazy reloads search
 * the same directory. Programmatic values keep priority.
 *
 * @throws ConfigError if a source holds an invalid value
 */
function load(directory?: string): Readonly<QuantgeoConfig> {
  searchFrom = directory;
  readSources(throwError);
  return configStore;
}

/**
 * Get a configuration value.
 */
function get<K extends keyof QuantgeoConfig>(key: K): QuantgeoConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically. Values set here survive reloads
 * triggered by reset() only until reset() clears them.
 */
function set(values: Partial<QuantgeoConfig>): void {
  const checked = validate({ ...values }, "config.set", throwError);
  overrides = { ...overrides, ...checked };
  initializeConfig();
  configStore = { ...configStore, ...checked };
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<QuantgeoConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing). Sources are read
 * again on the next access.
 */
function reset(): void {
  configStore = { ...DEFAULTS };
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = undefined;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  load,
  reset,
} as const;
