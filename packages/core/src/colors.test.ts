/**
 * Tests for the color model
 */

import { describe, it, expect } from "vitest";
import {
  BLACK,
  BLUE,
  DARK,
  GRAY,
  GREEN,
  LIGHT,
  RED,
  WHITE,
  YELLOW,
  assertColor,
  fromNative,
  nativeBrightness,
  rgbToGray4,
  rgbToRgb565,
  toNative,
} from "./colors.js";
import { InvalidColorError } from "./errors.js";

describe("rgbToGray4", () => {
  it("maps the grayscale ramp to fixed levels", () => {
    expect(rgbToGray4(BLACK)).toBe(0);
    expect(rgbToGray4(DARK)).toBe(6);
    expect(rgbToGray4(GRAY)).toBe(9);
    expect(rgbToGray4(LIGHT)).toBe(11);
    expect(rgbToGray4(WHITE)).toBe(15);
  });

  it("degrades accents to their channel mean", () => {
    // mean 85 -> 85 * 15 / 255 = 5
    expect(rgbToGray4(GREEN)).toBe(5);
    expect(rgbToGray4(RED)).toBe(5);
    expect(rgbToGray4(BLUE)).toBe(5);
    // mean 170 -> 10
    expect(rgbToGray4(YELLOW)).toBe(10);
  });
});

describe("rgbToRgb565", () => {
  it("truncates channels to 5/6/5 bits", () => {
    expect(rgbToRgb565(WHITE)).toBe(0xffff);
    expect(rgbToRgb565(BLACK)).toBe(0x0000);
    expect(rgbToRgb565(RED)).toBe(0xf800);
    expect(rgbToRgb565(GREEN)).toBe(0x07e0);
    expect(rgbToRgb565(BLUE)).toBe(0x001f);
  });

  it("encodes dark gray", () => {
    // 102 >> 3 = 12, 102 >> 2 = 25 -> (12 << 11) | (25 << 5) | 12
    expect(rgbToRgb565(DARK)).toBe(25388);
  });
});

describe("toNative", () => {
  it("dispatches on color depth", () => {
    expect(toNative(WHITE, "grayscale4")).toBe(15);
    expect(toNative(WHITE, "rgb565")).toBe(0xffff);
  });
});

describe("assertColor", () => {
  it("accepts channels in 0-255", () => {
    expect(() => assertColor({ r: 0, g: 128, b: 255 })).not.toThrow();
  });

  it("rejects out of range channels instead of clamping", () => {
    expect(() => assertColor({ r: 256, g: 0, b: 0 })).toThrow(InvalidColorError);
    expect(() => assertColor({ r: 0, g: -1, b: 0 })).toThrow(InvalidColorError);
  });

  it("rejects non-integer channels", () => {
    expect(() => rgbToGray4({ r: 0, g: 0, b: 1.5 })).toThrow(InvalidColorError);
    expect(() => rgbToRgb565({ r: Number.NaN, g: 0, b: 0 })).toThrow(InvalidColorError);
  });
});

describe("fromNative", () => {
  it("expands gray levels by 17", () => {
    expect(fromNative(6, "grayscale4")).toEqual({ r: 102, g: 102, b: 102 });
    expect(fromNative(15, "grayscale4")).toEqual({ r: 255, g: 255, b: 255 });
  });

  it("replicates RGB565 high bits", () => {
    expect(fromNative(0xf800, "rgb565")).toEqual({ r: 255, g: 0, b: 0 });
    expect(fromNative(0xffff, "rgb565")).toEqual({ r: 255, g: 255, b: 255 });
  });

  it("round-trips the grayscale ramp on grayscale4", () => {
    for (const color of [BLACK, DARK, GRAY, LIGHT, WHITE]) {
      expect(fromNative(rgbToGray4(color), "grayscale4")).toEqual(color);
    }
  });
});

describe("nativeBrightness", () => {
  it("averages the expanded channels", () => {
    expect(nativeBrightness(0xf800, "rgb565")).toBe(85);
    expect(nativeBrightness(9, "grayscale4")).toBe(153);
  });
});
