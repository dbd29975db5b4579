/**
 * Title and subtitle chrome
 *
 * Both sit at absolute offsets from the top and bottom edges:
 *   title     y = 20
 *   subtitle  y = height - 20           (one line)
 *             y = height - 21, height - 10  (two lines, 11px pitch)
 *
 * Lines are checked against the character limit and then against the disc
 * chord at their row, so a line that would spill past the rim throws.
 */

import {
  DARK,
  CHAR_W,
  GRAY,
  InvalidRangeError,
  SUBTITLE_MARGIN,
  TITLE_Y,
  TooManyLinesError,
  type GeometryProfile,
  type RGB,
} from "@roundscreen/core";
import type { Canvas } from "../canvas.js";
import { assertTextInDisc, centerTextX, drawText } from "../text.js";
import { assertMaxLength } from "./shared.js";

export const SUBTITLE_MAX_LINES = 2;
export const SUBTITLE_LINE_PITCH = 11;

/**
 * Render a centered title at the top of the screen
 */
export function renderTitle(canvas: Canvas, text: string, color: RGB = GRAY): void {
  const { profile } = canvas;
  assertMaxLength(text, profile.charsPerLine);
  const x = centerTextX(profile, text);
  assertTextInDisc(profile, text, x, TITLE_Y, CHAR_W);
  drawText(canvas, text, x, TITLE_Y, color);
}

/**
 * Top y of each subtitle row for a given line count
 */
export function subtitleRows(profile: GeometryProfile, lineCount: number): number[] {
  if (lineCount > SUBTITLE_MAX_LINES) {
    throw new TooManyLinesError(lineCount, SUBTITLE_MAX_LINES);
  }
  if (lineCount < 1) {
    throw new InvalidRangeError(`Subtitle needs 1 to ${SUBTITLE_MAX_LINES} lines, got ${lineCount}`);
  }
  if (lineCount === 2) {
    return [profile.height - SUBTITLE_MARGIN - 1, profile.height - SUBTITLE_MARGIN - 1 + SUBTITLE_LINE_PITCH];
  }
  return [profile.height - SUBTITLE_MARGIN];
}

/**
 * Render one or two centered lines at the bottom of the screen
 */
export function renderSubtitle(
  canvas: Canvas,
  lines: string | readonly string[],
  color: RGB = DARK
): void {
  const { profile } = canvas;
  const list = typeof lines === "string" ? [lines] : lines;
  const rows = subtitleRows(profile, list.length);

  list.forEach((line, i) => {
    assertMaxLength(line, profile.charsPerLine);
    assertTextInDisc(profile, line, centerTextX(profile, line), rows[i], CHAR_W);
  });

  list.forEach((line, i) => {
    drawText(canvas, line, centerTextX(profile, line), rows[i], color);
  });
}
