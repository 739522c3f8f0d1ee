import { describe, it, expect, afterEach } from "vitest";
import { ValidationError } from "core-types";
import { loadConfig, parseConfig, resetConfigCache } from "../config/configManager";

describe("config manager", () => {
  afterEach(() => resetConfigCache());

  it("loads and freezes the default config", () => {
    const cfg = loadConfig();
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.defaults.monteCarlo)).toBe(true);
    expect(cfg.defaults.monteCarlo).toEqual({ nsteps: 3, npaths: 5000, seed: 1, deg: 5, itmOnly: false });
    expect(cfg.defaults.lattice.nsteps).toBe(3);
    expect(cfg.logging.level).toBe("info");
  });

  it("caches until reset", () => {
    const first = loadConfig();
    expect(loadConfig()).toBe(first);
    resetConfigCache();
    expect(loadConfig()).not.toBe(first);
  });

  it("rejects invalid documents with field paths", () => {
    let caught: unknown;
    try {
      parseConfig({
        defaults: { lattice: { nsteps: 0 }, monteCarlo: { nsteps: 3, npaths: 10, seed: 1, deg: 5, itmOnly: false } },
        logging: { level: "verbose" },
      });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    const issues = caught instanceof ValidationError ? caught.issues : [];
    expect(issues.some((i) => i.startsWith("defaults.lattice.nsteps:"))).toBe(true);
    expect(issues.some((i) => i.startsWith("logging.level:"))).toBe(true);
  });

  it("throws when the file cannot be found", () => {
    expect(() => loadConfig("config/missing.yaml")).toThrow(/Unable to locate configuration file/);
  });
});
