import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  config,
  ConfigError,
  defineSpace,
  logger,
  quantize,
  tolerance,
  isApproxZero,
  approxEqual,
} from "../index.js";

const ENV_KEYS = ["QUANTGEO_DEBUG", "QUANTGEO_TOLERANCE", "QUANTGEO_ROUNDING"];

function clearEnv(): void {
  for (const key of ENV_KEYS) delete process.env[key];
}

beforeEach(() => {
  clearEnv();
  config.reset();
});

afterEach(() => {
  clearEnv();
  config.reset();
  vi.restoreAllMocks();
});

describe("config", () => {
  it("has defaults", () => {
    expect(config.getAll()).toEqual({
      debug: false,
      tolerance: 1e-10,
      rounding: "half-away",
    });
    expect(config.getConfigFilePath()).toBeUndefined();
  });

  it("reads QUANTGEO_* environment variables", () => {
    process.env.QUANTGEO_TOLERANCE = "1e-6";
    process.env.QUANTGEO_ROUNDING = "half-even";
    process.env.QUANTGEO_DEBUG = "1";
    config.reset();

    expect(config.get("tolerance")).toBe(1e-6);
    expect(config.get("rounding")).toBe("half-even");
    expect(config.get("debug")).toBe(true);
  });

  it("lets set() override the environment", () => {
    process.env.QUANTGEO_TOLERANCE = "1e-6";
    config.reset();
    config.set({ tolerance: 1e-3 });
    expect(config.get("tolerance")).toBe(1e-3);
  });

  it("reset() discards programmatic values", () => {
    config.set({ rounding: "half-even" });
    config.reset();
    expect(config.get("rounding")).toBe("half-away");
  });

  it("rejects a negative tolerance", () => {
    try {
      config.set({ tolerance: -1 });
      expect.unreachable("set should have thrown");
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) {
        expect(e.key).toBe("tolerance");
        expect(e.reason).toBe("invalid_tolerance");
      }
    }
    expect(config.get("tolerance")).toBe(1e-10);
  });

  it("warns and keeps the default for an invalid environment value", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    process.env.QUANTGEO_ROUNDING = "bankers";
    config.reset();

    expect(config.get("rounding")).toBe("half-away");
    expect(warn).toHaveBeenCalledWith(
      '[quantgeo] environment: rounding must be "half-away" or "half-even", got bankers; using the default'
    );
    expect(quantize(defineSpace("grid", { quantum: 0.5 }), 0.75)).toBe(1);
  });

  it("load() rejects an invalid environment value", () => {
    process.env.QUANTGEO_ROUNDING = "bankers";
    expect(() => config.load()).toThrow(ConfigError);
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "quantgeo-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeRc(contents: string): void {
    fs.writeFileSync(path.join(dir, ".quantgeorc.json"), contents);
  }

  it("reads .quantgeorc.json", () => {
    writeRc(JSON.stringify({ tolerance: 1e-4, rounding: "half-even" }));

    expect(config.load(dir)).toEqual({
      debug: false,
      tolerance: 1e-4,
      rounding: "half-even",
    });
    expect(config.getConfigFilePath()).toBe(path.join(dir, ".quantgeorc.json"));
  });

  it("layers defaults < file < environment < set()", () => {
    writeRc(JSON.stringify({ tolerance: 1e-4, rounding: "half-even" }));
    process.env.QUANTGEO_TOLERANCE = "1e-6";

    config.load(dir);
    expect(config.get("tolerance")).toBe(1e-6);
    expect(config.get("rounding")).toBe("half-even");
    expect(config.get("debug")).toBe(false);

    config.set({ tolerance: 1e-3 });
    expect(config.get("tolerance")).toBe(1e-3);

    config.load(dir);
    expect(config.get("tolerance")).toBe(1e-3);
    expect(config.get("rounding")).toBe("half-even");
  });

  it("load() throws on an invalid value in the file", () => {
    writeRc(JSON.stringify({ rounding: "up" }));
    expect(() => config.load(dir)).toThrow(
      `${path.join(dir, ".quantgeorc.json")}: rounding must be "half-away" or "half-even", got up`
    );
  });

  it("falls back to defaults when the invalid file is read lazily", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeRc(JSON.stringify({ rounding: "up", tolerance: 1e-4 }));
    expect(() => config.load(dir)).toThrow(ConfigError);

    expect(config.get("rounding")).toBe("half-away");
    expect(config.get("tolerance")).toBe(1e-4);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("rejects a file that is not an object", () => {
    writeRc("[1, 2]");
    try {
      config.load(dir);
      expect.unreachable("load should have thrown");
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) {
        expect(e.reason).toBe("invalid_file");
        expect(e.message).toBe(`${path.join(dir, ".quantgeorc.json")}: expected a configuration object`);
      }
    }
  });

  it("reports unparseable JSON as invalid_file", () => {
    writeRc("{ tolerance: ");
    try {
      config.load(dir);
      expect.unreachable("load should have thrown");
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) expect(e.reason).toBe("invalid_file");
    }
  });
});

describe("tolerance", () => {
  it("follows the configured epsilon", () => {
    expect(tolerance()).toBe(1e-10);
    expect(isApproxZero(1e-11)).toBe(true);
    expect(isApproxZero(1e-9)).toBe(false);

    config.set({ tolerance: 1e-6 });
    expect(isApproxZero(1e-9)).toBe(true);
  });

  it("accepts an explicit epsilon", () => {
    expect(approxEqual(1, 1.05, 0.1)).toBe(true);
    expect(approxEqual(1, 1.5, 0.1)).toBe(false);
  });
});

describe("logger", () => {
  it("stays quiet unless debug is on", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    logger.debug("hidden");
    expect(log).not.toHaveBeenCalled();

    config.set({ debug: true });
    logger.debug("shown");
    expect(log).toHaveBeenCalledWith("[quantgeo] shown");
  });

  it("always writes warnings", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    logger.warn("careful");
    expect(warn).toHaveBeenCalledWith("[quantgeo] careful");
  });
});
