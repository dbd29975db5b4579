/**
 * Circular arc gauge
 *
 * 270 degree arc starting bottom-left (135 degrees, clockwise from the
 * positive x axis), leaving a 90 degree gap at the bottom. The value and
 * unit are drawn in the middle.
 */

import {
  CHAR_H,
  CHAR_W,
  DARK,
  InvalidRangeError,
  LIGHT,
  WHITE,
  type GeometryProfile,
  type RGB,
} from "@roundscreen/core";
import type { Canvas } from "../canvas.js";
import { assertTextInDisc, centerTextX, drawScaledText, drawText } from "../text.js";
import { assertFinite, assertMaxLength, clamp, formatValue } from "./shared.js";
import { VALUE_MAX_CHARS, VALUE_SCALE } from "./value.js";

export const GAUGE_START_ANGLE = 135;
export const GAUGE_SWEEP = 270;
export const GAUGE_MIN_THICKNESS = 5;

export interface GaugeOptions {
  unit?: string;
  color?: RGB;
}

export interface GaugeLayout {
  thickness: number;
  arcRadius: number;
  startAngle: number;
  sweep: number;
  /** Filled portion of the sweep, in degrees */
  fillSweep: number;
  /** Value after clamping into [minVal, maxVal] */
  clamped: number;
}

export function gaugeLayout(
  profile: GeometryProfile,
  val: number,
  minVal: number = 0,
  maxVal: number = 100
): GaugeLayout {
  assertFinite("val", val);
  assertFinite("minVal", minVal);
  assertFinite("maxVal", maxVal);
  if (minVal >= maxVal) {
    throw new InvalidRangeError(`Gauge needs minVal < maxVal, got ${minVal}..${maxVal}`);
  }

  const thickness = Math.max(GAUGE_MIN_THICKNESS, Math.floor(profile.radius / 9));
  const clamped = clamp(val, minVal, maxVal);
  return {
    thickness,
    arcRadius: profile.radius - Math.floor(thickness / 2) - 1,
    startAngle: GAUGE_START_ANGLE,
    sweep: GAUGE_SWEEP,
    fillSweep: (GAUGE_SWEEP * (clamped - minVal)) / (maxVal - minVal),
    clamped,
  };
}

/**
 * Render the gauge arc, value and optional unit
 */
export function renderGauge(
  canvas: Canvas,
  val: number,
  minVal: number = 0,
  maxVal: number = 100,
  options: GaugeOptions = {}
): void {
  const { unit, color = LIGHT } = options;
  const { profile } = canvas;
  const gauge = gaugeLayout(profile, val, minVal, maxVal);
  const { x: cx, y: cy } = profile.center;
  const text = formatValue(val);
  const textX = centerTextX(profile, text, VALUE_SCALE);
  assertMaxLength(text, VALUE_MAX_CHARS);
  assertTextInDisc(profile, text, textX, cy - CHAR_H, CHAR_W * VALUE_SCALE);
  if (unit) {
    assertMaxLength(unit, profile.charsPerLine);
    assertTextInDisc(profile, unit, centerTextX(profile, unit), cy + CHAR_H + 2, CHAR_W);
  }

  canvas.arc(cx, cy, gauge.arcRadius, gauge.thickness, gauge.startAngle, gauge.sweep, DARK);
  if (gauge.fillSweep > 0) {
    canvas.arc(cx, cy, gauge.arcRadius, gauge.thickness, gauge.startAngle, gauge.fillSweep, color);
  }

  drawScaledText(canvas, text, textX, cy - CHAR_H, WHITE, VALUE_SCALE);
  if (unit) {
    drawText(canvas, unit, centerTextX(profile, unit), cy + CHAR_H + 2, LIGHT);
  }
}
