/**
 * Text rendering with the fixed 8x8 bitmap font
 *
 * Every size is the same glyph resampled (nearest neighbour) into a square
 * cell, advancing one cell per character:
 *   - small:  7px cell
 *   - base:   8px cell (scale 1)
 *   - medium: 10px cell
 *   - scaled: 16px / 24px cells (scale 2 / 3)
 */

import {
  CHAR_H,
  CHAR_W,
  InvalidScaleError,
  TextTooLongError,
  discSpan,
  isInsideDisc,
  type GeometryProfile,
  type Point,
  type RGB,
} from "@roundscreen/core";
import type { Canvas } from "./canvas.js";
import { assertPrintable, glyphBit, glyphRows } from "./font.js";

export const TEXT_SCALES = [1, 2, 3] as const;
export const LARGE_SCALES = [2, 3] as const;

export const SMALL_CELL = 7;
export const MEDIUM_CELL = 10;

export type TextScale = (typeof TEXT_SCALES)[number];

/** Cardinal anchor names for placing text on the round screen */
export type Anchor = "N" | "NE" | "E" | "SE" | "S" | "SW" | "W" | "NW" | "CENTER";

export const ANCHORS: readonly Anchor[] = ["N", "NE", "E", "SE", "S", "SW", "W", "NW", "CENTER"];

function assertScale(scale: number, allowed: readonly number[]): void {
  if (!allowed.includes(scale)) {
    throw new InvalidScaleError(scale, allowed);
  }
}

/**
 * One glyph resampled into a `cell` x `cell` bit mask
 */
function glyphCell(char: string, cell: number): Uint8Array {
  const rows = glyphRows(char);
  const bits = new Uint8Array(cell * cell);
  for (let py = 0; py < cell; py++) {
    const row = Math.floor((py * CHAR_H) / cell);
    for (let px = 0; px < cell; px++) {
      const col = Math.floor((px * CHAR_W) / cell);
      if (glyphBit(rows, col, row)) {
        bits[py * cell + px] = 1;
      }
    }
  }
  return bits;
}

function drawCells(
  canvas: Canvas,
  text: string,
  startX: number,
  startY: number,
  color: RGB,
  cell: number
): void {
  assertPrintable(text);
  const native = canvas.native(color);

  let cursorX = startX;
  for (const char of text) {
    canvas.backend.blit({ width: cell, height: cell, color: native, bits: glyphCell(char, cell) }, cursorX, startY);
    cursorX += cell;
  }
}

/**
 * Throw TextTooLongError unless every ink pixel of `text`, drawn at (x, y)
 * in `cell`-sized glyphs, lands inside the visible disc
 */
export function assertTextInDisc(
  profile: GeometryProfile,
  text: string,
  x: number,
  y: number,
  cell: number
): void {
  assertPrintable(text);
  let cursorX = x;
  for (const char of text) {
    const bits = glyphCell(char, cell);
    for (let i = 0; i < bits.length; i++) {
      if (bits[i] && !isInsideDisc(profile, cursorX + (i % cell), y + Math.floor(i / cell))) {
        const span = discSpan(profile, y, y + cell - 1);
        const fit = span ? Math.floor((span.maxX - span.minX + 1) / cell) : 0;
        throw new TextTooLongError(text, fit, `at y=${y}`);
      }
    }
    cursorX += cell;
  }
}

/**
 * Draw text at an integer scale (1, 2 or 3)
 */
export function drawText(
  canvas: Canvas,
  text: string,
  x: number,
  y: number,
  color: RGB,
  scale: number = 1
): void {
  assertScale(scale, TEXT_SCALES);
  drawCells(canvas, text, x, y, color, CHAR_W * scale);
}

/**
 * Large text, scale 2 or 3 only
 */
export function drawScaledText(
  canvas: Canvas,
  text: string,
  x: number,
  y: number,
  color: RGB,
  scale: number
): void {
  assertScale(scale, LARGE_SCALES);
  drawCells(canvas, text, x, y, color, CHAR_W * scale);
}

export function drawSmallText(canvas: Canvas, text: string, x: number, y: number, color: RGB): void {
  drawCells(canvas, text, x, y, color, SMALL_CELL);
}

export function drawMediumText(canvas: Canvas, text: string, x: number, y: number, color: RGB): void {
  drawCells(canvas, text, x, y, color, MEDIUM_CELL);
}

/**
 * Pixel width of a text string
 */
export function measureText(text: string, scale: number = 1): number {
  return text.length * CHAR_W * scale;
}

export function measureSmallText(text: string): number {
  return text.length * SMALL_CELL;
}

export function measureMediumText(text: string): number {
  return text.length * MEDIUM_CELL;
}

/**
 * X position that centers text horizontally on the screen
 */
export function centerTextX(profile: GeometryProfile, text: string, scale: number = 1): number {
  return profile.center.x - Math.floor(measureText(text, scale) / 2);
}

/**
 * Smallest distance from the top (or bottom) edge at which a line of text
 * `textWidth` pixels wide still fits inside the disc, plus 2px padding.
 * Never less than `fromEdge`.
 */
export function safeMargin(profile: GeometryProfile, textWidth: number, fromEdge: number): number {
  const r = profile.radius;
  const halfWidth = textWidth / 2;
  if (halfWidth >= r) {
    return r;
  }
  const maxDistance = Math.floor(Math.sqrt(r * r - halfWidth * halfWidth));
  return Math.max(r - maxDistance + 2, fromEdge);
}

/**
 * Top-left position for text placed at a cardinal anchor
 */
export function resolveAnchor(
  profile: GeometryProfile,
  at: Anchor,
  textLength: number,
  scale: number = 1
): Point {
  const { x: cx, y: cy } = profile.center;
  const charH = CHAR_H * scale;
  const textWidth = textLength * CHAR_W * scale;

  const marginNS = safeMargin(profile, textWidth, charH);
  const marginEW = charH + 4;
  const left = marginEW;
  const right = profile.width - marginEW - textWidth;
  const middleX = cx - Math.floor(textWidth / 2);
  const top = marginNS;
  const bottom = profile.height - marginNS - charH;
  const middleY = cy - Math.floor(charH / 2);

  switch (at) {
    case "N":
      return { x: middleX, y: top };
    case "NE":
      return { x: right, y: top };
    case "E":
      return { x: right, y: middleY };
    case "SE":
      return { x: right, y: bottom };
    case "S":
      return { x: middleX, y: bottom };
    case "SW":
      return { x: left, y: bottom };
    case "W":
      return { x: left, y: middleY };
    case "NW":
      return { x: left, y: top };
    case "CENTER":
      return { x: middleX, y: middleY };
  }
}

export function isAnchor(value: string): value is Anchor {
  return ANCHORS.some((anchor) => anchor === value);
}
