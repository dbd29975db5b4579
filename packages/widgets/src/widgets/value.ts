/**
 * Large value display
 *
 * Value text is drawn at scale 2 and vertically centered in the content
 * zone. With a unit, the block (value + half-cell gap + medium unit) is
 * centered instead. W and E anchors center the value on the left and right
 * quarter lines so two values can sit side by side.
 */

import {
  CHAR_H,
  CHAR_W,
  GRAY,
  LIGHT,
  WHITE,
  contentZone,
  type GeometryProfile,
  type Point,
  type RGB,
} from "@roundscreen/core";
import type { Canvas } from "../canvas.js";
import {
  MEDIUM_CELL,
  SMALL_CELL,
  assertTextInDisc,
  drawMediumText,
  drawScaledText,
  drawSmallText,
  measureMediumText,
  measureSmallText,
} from "../text.js";
import { assertFinite, assertMaxLength, formatValue } from "./shared.js";

export const VALUE_SCALE = 2;
export const VALUE_MAX_CHARS = 8;

export type ValueAnchor = "CENTER" | "W" | "E";

export interface ValueOptions {
  unit?: string;
  at?: ValueAnchor;
  /** Small caption drawn above the value */
  label?: string;
  color?: RGB;
  /** Extra vertical shift in pixels (negative moves up) */
  yOffset?: number;
}

export interface ValueLayout {
  text: string;
  value: Point;
  width: number;
  unit?: Point;
  label?: Point;
}

export function valueLayout(
  profile: GeometryProfile,
  val: number | string,
  options: ValueOptions = {}
): ValueLayout {
  const { unit, label, at = "CENTER", yOffset = 0 } = options;
  const text = formatValue(val);
  assertMaxLength(text, VALUE_MAX_CHARS);
  assertFinite("yOffset", yOffset);

  const charH = CHAR_H * VALUE_SCALE;
  const width = text.length * CHAR_W * VALUE_SCALE;
  const zone = contentZone(profile);
  const midY = Math.floor((zone.top + zone.bottom) / 2);

  const anchorX =
    at === "W"
      ? Math.floor(profile.width / 4)
      : at === "E"
        ? Math.floor((3 * profile.width) / 4)
        : profile.center.x;
  const x = anchorX - Math.floor(width / 2);

  const gap = Math.floor(charH / 2);
  const blockHeight = unit ? charH + gap + MEDIUM_CELL : charH;
  const y = midY - Math.floor(blockHeight / 2) + yOffset;

  const layout: ValueLayout = { text, value: { x, y }, width };
  if (unit) {
    layout.unit = {
      x: anchorX - Math.floor(measureMediumText(unit) / 2),
      y: y + charH + gap,
    };
  }
  if (label) {
    layout.label = {
      x: anchorX - Math.floor(measureSmallText(label) / 2),
      y: y - SMALL_CELL - 4,
    };
  }
  return layout;
}

/**
 * Render a large value with optional unit below and label above. Value,
 * unit and label must each land inside the disc.
 */
export function renderValue(
  canvas: Canvas,
  val: number | string,
  options: ValueOptions = {}
): void {
  const { unit, label, color = WHITE } = options;
  const { profile } = canvas;
  const layout = valueLayout(profile, val, options);
  assertTextInDisc(profile, layout.text, layout.value.x, layout.value.y, CHAR_W * VALUE_SCALE);
  if (unit && layout.unit) assertTextInDisc(profile, unit, layout.unit.x, layout.unit.y, MEDIUM_CELL);
  if (label && layout.label) assertTextInDisc(profile, label, layout.label.x, layout.label.y, SMALL_CELL);

  if (label && layout.label) {
    drawSmallText(canvas, label, layout.label.x, layout.label.y, GRAY);
  }
  drawScaledText(canvas, layout.text, layout.value.x, layout.value.y, color, VALUE_SCALE);
  if (unit && layout.unit) {
    drawMediumText(canvas, unit, layout.unit.x, layout.unit.y, LIGHT);
  }
}
