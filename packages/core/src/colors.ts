/**
 * Color model
 *
 * Widgets work in abstract RGB. Each backend declares its color depth and
 * the conversion to its native encoding happens here, nowhere else:
 *   - grayscale4: mean of the channels quantized to 0-15
 *   - rgb565:     5/6/5 bit truncation, no dithering
 */

import { InvalidColorError } from "./errors.js";
import type { ColorDepth, NativeColor, RGB } from "./types.js";

export const COLORS = {
  // Grayscale ramp, gray4 index * 17 so the ramp round-trips exactly
  black: { r: 0, g: 0, b: 0 },
  dark: { r: 102, g: 102, b: 102 }, // 6
  gray: { r: 153, g: 153, b: 153 }, // 9
  light: { r: 187, g: 187, b: 187 }, // 11
  white: { r: 255, g: 255, b: 255 }, // 15

  // Accents degrade to their channel mean on grayscale panels
  green: { r: 0, g: 255, b: 0 },
  red: { r: 255, g: 0, b: 0 },
  yellow: { r: 255, g: 255, b: 0 },
  blue: { r: 0, g: 0, b: 255 },
} as const satisfies Record<string, RGB>;

export const BLACK: RGB = COLORS.black;
export const DARK: RGB = COLORS.dark;
export const GRAY: RGB = COLORS.gray;
export const LIGHT: RGB = COLORS.light;
export const WHITE: RGB = COLORS.white;
export const GREEN: RGB = COLORS.green;
export const RED: RGB = COLORS.red;
export const YELLOW: RGB = COLORS.yellow;
export const BLUE: RGB = COLORS.blue;

function isChannel(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 255;
}

/**
 * Reject colors with channels outside 0-255 (or non-integer).
 * Values are never clamped.
 */
export function assertColor(color: RGB): void {
  for (const channel of ["r", "g", "b"] as const) {
    if (!isChannel(color[channel])) {
      throw new InvalidColorError(
        `Channel ${channel}=${color[channel]} is not an integer in 0-255`
      );
    }
  }
}

export function rgbToGray4(color: RGB): NativeColor {
  assertColor(color);
  const gray = Math.round((color.r + color.g + color.b) / 3);
  return Math.round((gray * 15) / 255);
}

export function rgbToRgb565(color: RGB): NativeColor {
  assertColor(color);
  return ((color.r >> 3) << 11) | ((color.g >> 2) << 5) | (color.b >> 3);
}

/**
 * Convert an RGB color to the native encoding of a backend
 */
export function toNative(color: RGB, depth: ColorDepth): NativeColor {
  return depth === "grayscale4" ? rgbToGray4(color) : rgbToRgb565(color);
}

/**
 * Expand a native color back to RGB, for previews and debugging.
 * Gray levels map to level * 17; RGB565 replicates high bits into the low ones.
 */
export function fromNative(native: NativeColor, depth: ColorDepth): RGB {
  if (depth === "grayscale4") {
    const v = Math.max(0, Math.min(15, native)) * 17;
    return { r: v, g: v, b: v };
  }
  const r5 = (native >> 11) & 0x1f;
  const g6 = (native >> 5) & 0x3f;
  const b5 = native & 0x1f;
  return {
    r: (r5 << 3) | (r5 >> 2),
    g: (g6 << 2) | (g6 >> 4),
    b: (b5 << 3) | (b5 >> 2),
  };
}

/**
 * Perceived brightness (0-255) of a native color
 */
export function nativeBrightness(native: NativeColor, depth: ColorDepth): number {
  const { r, g, b } = fromNative(native, depth);
  return (r + g + b) / 3;
}
