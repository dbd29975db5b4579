/**
 * Tests for geometry profiles
 */

import { describe, it, expect } from "vitest";
import { InvalidRangeError } from "./errors.js";
import {
  PROFILE_128,
  PROFILE_240,
  contentZone,
  createProfile,
  discSpan,
  isInsideDisc,
  rectInsideDisc,
  rowSpan,
} from "./geometry.js";

describe("createProfile", () => {
  it("derives the 128 profile", () => {
    expect(PROFILE_128).toEqual({
      width: 128,
      height: 128,
      center: { x: 64, y: 64 },
      radius: 64,
      charsPerLine: 16,
    });
  });

  it("derives the 240 profile", () => {
    expect(PROFILE_240.center).toEqual({ x: 120, y: 120 });
    expect(PROFILE_240.radius).toBe(120);
    expect(PROFILE_240.charsPerLine).toBe(30);
  });

  it("returns a frozen profile", () => {
    expect(Object.isFrozen(PROFILE_128)).toBe(true);
    expect(Object.isFrozen(PROFILE_128.center)).toBe(true);
  });

  it("rejects non-square or invalid sizes", () => {
    expect(() => createProfile(128, 64)).toThrow(InvalidRangeError);
    expect(() => createProfile(0)).toThrow(InvalidRangeError);
    expect(() => createProfile(12.5)).toThrow(InvalidRangeError);
  });
});

describe("contentZone", () => {
  it("sits between the title and subtitle chrome", () => {
    expect(contentZone(PROFILE_128)).toEqual({ top: 28, bottom: 108 });
    expect(contentZone(PROFILE_240)).toEqual({ top: 28, bottom: 220 });
  });
});

describe("isInsideDisc", () => {
  it("includes the center and edge midpoints", () => {
    expect(isInsideDisc(PROFILE_128, 64, 64)).toBe(true);
    expect(isInsideDisc(PROFILE_128, 0, 64)).toBe(true);
    expect(isInsideDisc(PROFILE_128, 64, 127)).toBe(true);
  });

  it("excludes the corners", () => {
    expect(isInsideDisc(PROFILE_128, 0, 0)).toBe(false);
    expect(isInsideDisc(PROFILE_240, 239, 239)).toBe(false);
  });

  it("accepts any pixel area, such as a frame", () => {
    const area = { width: 4, height: 4 };
    expect(isInsideDisc(area, 0, 0)).toBe(false);
    expect(isInsideDisc(area, 1, 0)).toBe(true);
    expect(isInsideDisc(area, 2, 3)).toBe(true);
  });
});

describe("rowSpan", () => {
  it("covers the full width at the middle row", () => {
    expect(rowSpan(PROFILE_128, 64)).toEqual({ minX: 0, maxX: 127 });
  });

  it("narrows toward the top edge", () => {
    expect(rowSpan(PROFILE_128, 0)).toEqual({ minX: 56, maxX: 71 });
    expect(rowSpan(PROFILE_128, 20)).toEqual({ minX: 17, maxX: 110 });
  });

  it("agrees with isInsideDisc at both ends of every row", () => {
    for (const profile of [PROFILE_128, PROFILE_240]) {
      for (let y = 0; y < profile.height; y++) {
        const span = rowSpan(profile, y);
        if (!span) continue;
        expect(isInsideDisc(profile, span.minX, y)).toBe(true);
        expect(isInsideDisc(profile, span.maxX, y)).toBe(true);
        expect(isInsideDisc(profile, span.minX - 1, y)).toBe(false);
        expect(isInsideDisc(profile, span.maxX + 1, y)).toBe(false);
      }
    }
  });

  it("returns null outside the framebuffer rows", () => {
    expect(rowSpan(PROFILE_128, -2)).toBeNull();
    expect(rowSpan(PROFILE_128, 130)).toBeNull();
  });
});

describe("discSpan", () => {
  it("keeps the narrowest row of a band", () => {
    expect(discSpan(PROFILE_240, 38, 90)).toEqual({ minX: 32, maxX: 207 });
    expect(discSpan(PROFILE_128, 20)).toEqual(rowSpan(PROFILE_128, 20));
  });

  it("returns null when any row misses the disc", () => {
    expect(discSpan(PROFILE_128, 120, 130)).toBeNull();
  });
});

describe("rectInsideDisc", () => {
  it("accepts the bar track on the 128 screen", () => {
    expect(rectInsideDisc(PROFILE_128, 20, 84, 88, 8)).toBe(true);
  });

  it("rejects a rectangle that clips the rim", () => {
    expect(rectInsideDisc(PROFILE_240, 30, 38, 190, 52)).toBe(false);
    expect(rectInsideDisc(PROFILE_240, 32, 38, 176, 53)).toBe(true);
  });
});
