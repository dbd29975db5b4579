/**
 * Analog watch face
 */

import {
  GRAY,
  InvalidRangeError,
  LIGHT,
  WHITE,
  type GeometryProfile,
  type Point,
  type RGB,
} from "@roundscreen/core";
import type { Canvas } from "../canvas.js";
import { polar } from "./shared.js";

export const DIAL_MARGIN = 8;

export interface WatchOptions {
  /** Hour and minute hands */
  color?: RGB;
  secondColor?: RGB;
  dialColor?: RGB;
}

export interface WatchLayout {
  dialRadius: number;
  hourLength: number;
  minuteLength: number;
  secondLength: number;
}

export interface HandAngles {
  hour: number;
  minute: number;
  second: number;
}

export function watchLayout(profile: GeometryProfile): WatchLayout {
  const dialRadius = profile.radius - DIAL_MARGIN;
  return {
    dialRadius,
    hourLength: Math.floor(dialRadius * 0.5),
    minuteLength: Math.floor(dialRadius * 0.75),
    secondLength: Math.floor(dialRadius * 0.85),
  };
}

function assertUnit(name: string, value: number, limit: number): void {
  if (!Number.isInteger(value) || value < 0 || value >= limit) {
    throw new InvalidRangeError(`${name} must be an integer in [0, ${limit}), got ${value}`);
  }
}

/**
 * Hand angles in degrees, clockwise from 12 o'clock. The hour hand
 * advances half a degree per minute.
 */
export function handAngles(hours: number, minutes: number, seconds: number): HandAngles {
  assertUnit("hours", hours, 24);
  assertUnit("minutes", minutes, 60);
  assertUnit("seconds", seconds, 60);
  return {
    hour: (hours % 12) * 30 + minutes * 0.5,
    minute: minutes * 6,
    second: seconds * 6,
  };
}

/**
 * Tip positions of the three hands
 */
export function handTips(
  profile: GeometryProfile,
  hours: number,
  minutes: number,
  seconds: number
): { hour: Point; minute: Point; second: Point } {
  const angles = handAngles(hours, minutes, seconds);
  const layout = watchLayout(profile);
  return {
    hour: polar(profile.center, layout.hourLength, angles.hour),
    minute: polar(profile.center, layout.minuteLength, angles.minute),
    second: polar(profile.center, layout.secondLength, angles.second),
  };
}

function thickLine(canvas: Canvas, from: Point, to: Point, width: number, color: RGB): void {
  const half = Math.floor(width / 2);
  for (let d = -half; d <= half; d++) {
    canvas.line(from.x + d, from.y, to.x + d, to.y, color);
    canvas.line(from.x, from.y + d, to.x, to.y + d, color);
  }
}

/**
 * Render dial, hour ticks and hands
 */
export function renderWatch(
  canvas: Canvas,
  hours: number,
  minutes: number,
  seconds: number,
  options: WatchOptions = {}
): void {
  const { color = WHITE, secondColor = LIGHT, dialColor = GRAY } = options;
  const { profile } = canvas;
  const tips = handTips(profile, hours, minutes, seconds);
  const layout = watchLayout(profile);
  const center = profile.center;

  canvas.circle(center.x, center.y, layout.dialRadius, dialColor);

  for (let hour = 0; hour < 12; hour++) {
    const quarter = hour % 3 === 0;
    const inner = polar(center, layout.dialRadius - (quarter ? 10 : 6), hour * 30);
    const outer = polar(center, layout.dialRadius - 2, hour * 30);
    canvas.line(inner.x, inner.y, outer.x, outer.y, quarter ? WHITE : dialColor);
  }

  thickLine(canvas, center, tips.hour, 3, color);
  thickLine(canvas, center, tips.minute, 1, color);
  canvas.line(center.x, center.y, tips.second.x, tips.second.y, secondColor);
  canvas.fillCircle(center.x, center.y, 2, WHITE);
}
