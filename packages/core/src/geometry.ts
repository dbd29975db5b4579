/**
 * Geometry profiles
 *
 * A profile is the only thing that differs between the two screens. Every
 * widget computes its layout from these fields, so widget code never asks
 * which panel it is drawing on.
 *
 *   width == height, center = (width/2, height/2), radius = width/2,
 *   charsPerLine = width / 8
 */

import { InvalidRangeError } from "./errors.js";
import type { Point } from "./types.js";

export interface GeometryProfile {
  readonly width: number;
  readonly height: number;
  readonly center: Readonly<Point>;
  readonly radius: number;
  readonly charsPerLine: number;
}

/** Fixed glyph cell of the bitmap font */
export const CHAR_W = 8;
export const CHAR_H = 8;

// Chrome margins are absolute, only the content zone between them scales
export const TITLE_Y = 20;
export const SUBTITLE_MARGIN = 20;
export const CONTENT_TOP = 28;

export function createProfile(width: number, height: number = width): GeometryProfile {
  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidRangeError(`Profile width must be a positive integer, got ${width}`);
  }
  if (height !== width) {
    throw new InvalidRangeError(`Round screens are square, got ${width}x${height}`);
  }
  const half = Math.floor(width / 2);
  return Object.freeze({
    width,
    height,
    center: Object.freeze({ x: half, y: half }),
    radius: half,
    charsPerLine: Math.floor(width / CHAR_W),
  });
}

/** 128x128 grayscale OLED (SSD1327) */
export const PROFILE_128 = createProfile(128);

/** 240x240 color TFT (GC9A01) */
export const PROFILE_240 = createProfile(240);

/**
 * Vertical band between title and subtitle chrome
 */
export function contentZone(profile: GeometryProfile): { top: number; bottom: number } {
  return { top: CONTENT_TOP, bottom: profile.height - SUBTITLE_MARGIN };
}

/** Anything with a pixel size: a profile or a frame */
export type PixelArea = Pick<GeometryProfile, "width" | "height">;

/**
 * Whether the center of pixel (x, y) falls inside the visible disc.
 * The disc is centred on (width/2, height/2) with radius floor(min/2).
 */
export function isInsideDisc(area: PixelArea, x: number, y: number): boolean {
  const r = Math.floor(Math.min(area.width, area.height) / 2);
  const dx = x + 0.5 - area.width / 2;
  const dy = y + 0.5 - area.height / 2;
  return dx * dx + dy * dy <= r * r;
}

/** Inclusive run of columns */
export interface Span {
  readonly minX: number;
  readonly maxX: number;
}

/**
 * Columns of row y whose pixels pass isInsideDisc, or null when the row
 * misses the disc
 */
export function rowSpan(profile: GeometryProfile, y: number): Span | null {
  const dy = y + 0.5 - profile.height / 2;
  const rest = profile.radius * profile.radius - dy * dy;
  if (rest < 0) return null;
  const half = Math.sqrt(rest);
  const cx = profile.width / 2;
  const minX = Math.max(0, Math.ceil(cx - half - 0.5));
  const maxX = Math.min(profile.width - 1, Math.floor(cx + half - 0.5));
  return minX <= maxX ? { minX, maxX } : null;
}

/**
 * Columns inside the disc on every row from top to bottom (inclusive)
 */
export function discSpan(profile: GeometryProfile, top: number, bottom: number = top): Span | null {
  let minX = 0;
  let maxX = profile.width - 1;
  for (let y = top; y <= bottom; y++) {
    const span = rowSpan(profile, y);
    if (!span) return null;
    minX = Math.max(minX, span.minX);
    maxX = Math.min(maxX, span.maxX);
  }
  return minX <= maxX ? { minX, maxX } : null;
}

/**
 * Whether a width x height rectangle at (x, y) lies wholly inside the disc
 */
export function rectInsideDisc(
  profile: GeometryProfile,
  x: number,
  y: number,
  width: number,
  height: number
): boolean {
  if (width <= 0 || height <= 0) return true;
  const span = discSpan(profile, y, y + height - 1);
  return span !== null && x >= span.minX && x + width - 1 <= span.maxX;
}
