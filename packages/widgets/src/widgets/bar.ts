/**
 * Horizontal progress bar below the screen center. The whole track must lie
 * inside the disc, so a large yOffset is rejected.
 */

import {
  DARK,
  InvalidRangeError,
  LIGHT,
  rectInsideDisc,
  type GeometryProfile,
  type RGB,
} from "@roundscreen/core";
import type { Canvas } from "../canvas.js";
import { assertFinite, clamp } from "./shared.js";

export const BAR_HEIGHT = 8;
/** Track is this much narrower than the screen */
export const BAR_INSET = 40;
/** Track top sits this far below the center */
export const BAR_OFFSET_Y = 20;

export interface BarOptions {
  yOffset?: number;
  color?: RGB;
}

export interface BarLayout {
  x: number;
  y: number;
  width: number;
  height: number;
  fillWidth: number;
}

export function barLayout(
  profile: GeometryProfile,
  val: number,
  maxVal: number = 100,
  yOffset: number = 0
): BarLayout {
  assertFinite("val", val);
  assertFinite("maxVal", maxVal);
  assertFinite("yOffset", yOffset);
  if (maxVal <= 0) {
    throw new InvalidRangeError(`Bar maxVal must be > 0, got ${maxVal}`);
  }

  const width = profile.width - BAR_INSET;
  const ratio = clamp(val, 0, maxVal) / maxVal;
  const x = profile.center.x - Math.floor(width / 2);
  const y = profile.center.y + BAR_OFFSET_Y + yOffset;
  if (!rectInsideDisc(profile, x, y, width, BAR_HEIGHT)) {
    throw new InvalidRangeError(`Bar at y=${y} does not fit inside the disc`);
  }
  return { x, y, width, height: BAR_HEIGHT, fillWidth: Math.round(width * ratio) };
}

/**
 * Render a progress bar: dark track, filled portion on top
 */
export function renderBar(
  canvas: Canvas,
  val: number,
  maxVal: number = 100,
  options: BarOptions = {}
): void {
  const { yOffset = 0, color = LIGHT } = options;
  const bar = barLayout(canvas.profile, val, maxVal, yOffset);

  canvas.fillRect(bar.x, bar.y, bar.width, bar.height, DARK);
  if (bar.fillWidth > 0) {
    canvas.fillRect(bar.x, bar.y, bar.fillWidth, bar.height, color);
  }
}
