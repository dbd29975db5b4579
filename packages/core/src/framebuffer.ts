/**
 * In-memory framebuffer backend
 *
 * Frame format:
 * - width x height pixels, row-major
 * - one native color per pixel in a Uint16Array
 *   (gray index 0-15 or RGB565 word, depending on depth)
 *
 * Writes outside the buffer are clipped silently.
 */

import type { Backend, FrameSink } from "./backend.js";
import { isInsideDisc } from "./geometry.js";
import type { Bitmap, Bounds, ColorDepth, NativeColor, NativeFrame } from "./types.js";

/**
 * Create an empty frame filled with a single native color
 */
export function createFrame(
  width: number,
  height: number,
  depth: ColorDepth,
  color: NativeColor = 0
): NativeFrame {
  const pixels = new Uint16Array(width * height);
  if (color !== 0) pixels.fill(color);
  return { width, height, depth, pixels };
}

/**
 * Get a native pixel value from a frame, or null outside it
 */
export function getPixel(frame: NativeFrame, x: number, y: number): NativeColor | null {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height) {
    return null;
  }
  return frame.pixels[y * frame.width + x];
}

/**
 * Copy a frame (pixels are not shared)
 */
export function cloneFrame(frame: NativeFrame): NativeFrame {
  return { ...frame, pixels: frame.pixels.slice() };
}

/**
 * Smallest rectangle holding every pixel that matches `predicate`
 * (default: any non-zero pixel). Null when nothing matches.
 */
export function findInkBounds(
  frame: NativeFrame,
  predicate: (color: NativeColor) => boolean = (c) => c !== 0,
  region?: Bounds
): Bounds | null {
  const x0 = Math.max(0, region?.minX ?? 0);
  const y0 = Math.max(0, region?.minY ?? 0);
  const x1 = Math.min(frame.width - 1, region?.maxX ?? frame.width - 1);
  const y1 = Math.min(frame.height - 1, region?.maxY ?? frame.height - 1);

  let bounds: Bounds | null = null;
  for (let y = y0; y <= y1; y++) {
    for (let x = x0; x <= x1; x++) {
      if (!predicate(frame.pixels[y * frame.width + x])) continue;
      if (!bounds) {
        bounds = { minX: x, minY: y, maxX: x, maxY: y };
      } else {
        bounds.minX = Math.min(bounds.minX, x);
        bounds.minY = Math.min(bounds.minY, y);
        bounds.maxX = Math.max(bounds.maxX, x);
        bounds.maxY = Math.max(bounds.maxY, y);
      }
    }
  }
  return bounds;
}

/**
 * Count pixels equal to a native color
 */
export function countPixels(frame: NativeFrame, color: NativeColor): number {
  let count = 0;
  for (const pixel of frame.pixels) {
    if (pixel === color) count++;
  }
  return count;
}

/**
 * Number of non-black pixels outside the visible disc
 */
export function countInkOutsideDisc(frame: NativeFrame): number {
  let count = 0;
  for (let y = 0; y < frame.height; y++) {
    for (let x = 0; x < frame.width; x++) {
      if (frame.pixels[y * frame.width + x] !== 0 && !isInsideDisc(frame, x, y)) count++;
    }
  }
  return count;
}

export interface FramebufferOptions {
  width: number;
  height: number;
  depth: ColorDepth;
  /** Called with a snapshot on every present() */
  sink?: FrameSink;
}

export class FramebufferBackend implements Backend {
  readonly width: number;
  readonly height: number;
  readonly frame: NativeFrame;

  private readonly depth: ColorDepth;
  private readonly sink?: FrameSink;
  private presented: NativeFrame | null = null;
  private presents = 0;

  constructor(options: FramebufferOptions) {
    this.width = options.width;
    this.height = options.height;
    this.depth = options.depth;
    this.sink = options.sink;
    this.frame = createFrame(options.width, options.height, options.depth);
  }

  colorDepth(): ColorDepth {
    return this.depth;
  }

  /** Number of present() calls so far */
  get presentCount(): number {
    return this.presents;
  }

  /** Snapshot handed out by the most recent present() */
  get lastPresented(): NativeFrame | null {
    return this.presented;
  }

  setPixel(x: number, y: number, color: NativeColor): void {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      return;
    }
    this.frame.pixels[y * this.width + x] = color;
  }

  /**
   * Bresenham line, both endpoints included
   */
  drawLine(x0: number, y0: number, x1: number, y1: number, color: NativeColor): void {
    const dx = Math.abs(x1 - x0);
    const dy = -Math.abs(y1 - y0);
    const sx = x0 < x1 ? 1 : -1;
    const sy = y0 < y1 ? 1 : -1;
    let err = dx + dy;
    let x = x0;
    let y = y0;

    for (;;) {
      this.setPixel(x, y, color);
      if (x === x1 && y === y1) break;
      const e2 = 2 * err;
      if (e2 >= dy) {
        err += dy;
        x += sx;
      }
      if (e2 <= dx) {
        err += dx;
        y += sy;
      }
    }
  }

  fillRect(x: number, y: number, w: number, h: number, color: NativeColor): void {
    const xStart = Math.max(0, x);
    const yStart = Math.max(0, y);
    const xEnd = Math.min(this.width, x + w);
    const yEnd = Math.min(this.height, y + h);
    for (let py = yStart; py < yEnd; py++) {
      const row = py * this.width;
      this.frame.pixels.fill(color, row + xStart, Math.max(row + xStart, row + xEnd));
    }
  }

  drawRect(x: number, y: number, w: number, h: number, color: NativeColor): void {
    if (w <= 0 || h <= 0) return;
    this.drawHLine(x, y, w, color);
    this.drawHLine(x, y + h - 1, w, color);
    this.drawVLine(x, y, h, color);
    this.drawVLine(x + w - 1, y, h, color);
  }

  drawHLine(x: number, y: number, w: number, color: NativeColor): void {
    this.fillRect(x, y, w, 1, color);
  }

  drawVLine(x: number, y: number, h: number, color: NativeColor): void {
    this.fillRect(x, y, 1, h, color);
  }

  blit(bitmap: Bitmap, x: number, y: number): void {
    for (let row = 0; row < bitmap.height; row++) {
      for (let col = 0; col < bitmap.width; col++) {
        if (bitmap.bits[row * bitmap.width + col]) {
          this.setPixel(x + col, y + row, bitmap.color);
        }
      }
    }
  }

  clearBuffer(): void {
    this.frame.pixels.fill(0);
  }

  present(): void {
    const snapshot = cloneFrame(this.frame);
    this.presented = snapshot;
    this.presents++;
    this.sink?.(snapshot);
  }
}
