/**
 * Tests for canvas shape rasterizers
 */

import { describe, it, expect } from "vitest";
import {
  FramebufferBackend,
  WHITE,
  countPixels,
  createProfile,
  findInkBounds,
  getPixel,
} from "@roundscreen/core";
import { Canvas } from "./canvas.js";

function setup(size = 16) {
  const backend = new FramebufferBackend({ width: size, height: size, depth: "grayscale4" });
  return { backend, canvas: new Canvas(backend, createProfile(size)) };
}

describe("Canvas", () => {
  it("converts colors to the backend depth", () => {
    const { canvas } = setup();
    expect(canvas.depth).toBe("grayscale4");
    expect(canvas.native(WHITE)).toBe(15);
  });

  it("draws a circle outline through the cardinal points", () => {
    const { backend, canvas } = setup();
    canvas.circle(8, 8, 3, WHITE);
    expect(findInkBounds(backend.frame)).toEqual({ minX: 5, minY: 5, maxX: 11, maxY: 11 });
    expect(getPixel(backend.frame, 8, 8)).toBe(0);
  });

  it("fills a circle row by row", () => {
    const { backend, canvas } = setup();
    canvas.fillCircle(8, 8, 2, WHITE);
    // rows of 1, 3, 5, 3, 1 pixels
    expect(countPixels(backend.frame, 15)).toBe(13);
  });

  it("fills a right triangle", () => {
    const { backend, canvas } = setup();
    canvas.fillTriangle(0, 0, 4, 0, 0, 4, WHITE);
    // rows of 5, 4, 3, 2, 1 pixels
    expect(countPixels(backend.frame, 15)).toBe(15);
  });

  it("draws nothing for an empty arc sweep", () => {
    const { backend, canvas } = setup();
    canvas.arc(8, 8, 5, 2, 135, 0, WHITE);
    expect(findInkBounds(backend.frame)).toBeNull();
  });

  it("draws the arc clockwise from its start angle", () => {
    const { backend, canvas } = setup();
    // 0 degrees points right, 90 points down
    canvas.arc(8, 8, 5, 2, 0, 100, WHITE);
    expect(getPixel(backend.frame, 13, 8)).toBe(15);
    expect(getPixel(backend.frame, 8, 13)).toBe(15);
    expect(getPixel(backend.frame, 3, 8)).toBe(0);
    expect(getPixel(backend.frame, 8, 3)).toBe(0);
  });

  it("blits a mask in blocks", () => {
    const { backend, canvas } = setup();
    canvas.blitMask(
      [
        [true, false],
        [false, true],
      ],
      1,
      1,
      2,
      WHITE
    );
    expect(countPixels(backend.frame, 15)).toBe(8);
    expect(findInkBounds(backend.frame)).toEqual({ minX: 1, minY: 1, maxX: 4, maxY: 4 });
    expect(getPixel(backend.frame, 3, 1)).toBe(0);
  });
});
