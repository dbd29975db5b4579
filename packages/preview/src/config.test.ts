/**
 * Tests for preview configuration
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, configFromEnv, parseDevice } from "./config.js";

describe("configFromEnv", () => {
  it("falls back to defaults", () => {
    expect(configFromEnv({})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG).toEqual({ device: "ssd1327", outDir: "previews", mask: true });
  });

  it("reads every variable", () => {
    expect(
      configFromEnv({
        ROUNDSCREEN_DEVICE: "GC9A01",
        ROUNDSCREEN_OUT_DIR: "out/frames",
        ROUNDSCREEN_MASK: "false",
      })
    ).toEqual({ device: "gc9a01", outDir: "out/frames", mask: false });
  });

  it("ignores a blank output directory", () => {
    expect(configFromEnv({ ROUNDSCREEN_OUT_DIR: "  " }).outDir).toBe("previews");
  });

  it("names the variable in validation errors", () => {
    expect(() => configFromEnv({ ROUNDSCREEN_DEVICE: "st7789" })).toThrow(
      'ROUNDSCREEN_DEVICE must be one of ssd1327, gc9a01, got "st7789"'
    );
    expect(() => configFromEnv({ ROUNDSCREEN_MASK: "maybe" })).toThrow(
      'ROUNDSCREEN_MASK must be true or false, got "maybe"'
    );
  });
});

describe("parseDevice", () => {
  it("trims and lowercases", () => {
    expect(parseDevice("--device", " SSD1327 ")).toBe("ssd1327");
  });
});
