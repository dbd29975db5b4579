/**
 * Core types for the round screen system
 */

/** RGB color (0-255 per channel) */
export interface RGB {
  r: number;
  g: number;
  b: number;
}

/** Native pixel encoding reported by a backend */
export type ColorDepth = "grayscale4" | "rgb565";

/** Backend-specific encoded color: 4-bit gray index or 16-bit RGB565 word */
export type NativeColor = number;

export interface Point {
  x: number;
  y: number;
}

/** A single frame of native pixel data */
export interface NativeFrame {
  width: number;
  height: number;
  depth: ColorDepth;
  /** One native color per pixel, row-major */
  pixels: Uint16Array;
}

/**
 * One-color bitmap for blitting. Each byte of `bits` is one pixel,
 * row-major; non-zero means ink, zero is transparent.
 */
export interface Bitmap {
  width: number;
  height: number;
  color: NativeColor;
  bits: Uint8Array;
}

/** Inclusive pixel bounds */
export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}
