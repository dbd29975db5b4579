/**
 * Compass rose with a rotating needle. 0 degrees is North (up) and
 * headings turn clockwise; any finite heading is reduced modulo 360.
 */

import {
  CHAR_H,
  CHAR_W,
  DARK,
  GRAY,
  LIGHT,
  WHITE,
  type GeometryProfile,
  type Point,
  type RGB,
} from "@roundscreen/core";
import type { Canvas } from "../canvas.js";
import { drawText } from "../text.js";
import { assertFinite, polar } from "./shared.js";

export const ROSE_MARGIN = 12;
export const LABEL_OFFSET = 5;
const TICK_LENGTH = 6;
const NEEDLE_HALF_WIDTH = 3;
const PIVOT_RADIUS = 3;

const CARDINALS: ReadonlyArray<readonly [string, number]> = [
  ["N", 0],
  ["E", 90],
  ["S", 180],
  ["W", 270],
];

export interface CompassOptions {
  color?: RGB;
}

export interface CompassLayout {
  roseRadius: number;
  innerRadius: number;
  needleLength: number;
  labelRadius: number;
}

export function compassLayout(profile: GeometryProfile): CompassLayout {
  const roseRadius = profile.radius - ROSE_MARGIN;
  return {
    roseRadius,
    innerRadius: Math.floor(roseRadius * 0.7),
    needleLength: Math.floor(roseRadius * 0.85),
    labelRadius: roseRadius + LABEL_OFFSET,
  };
}

export function normalizeHeading(heading: number): number {
  assertFinite("heading", heading);
  return ((heading % 360) + 360) % 360;
}

/**
 * Screen position of the needle's north tip
 */
export function needleTip(profile: GeometryProfile, heading: number): Point {
  return polar(profile.center, compassLayout(profile).needleLength, normalizeHeading(heading));
}

/**
 * Render rose circles, ticks, cardinal labels and the needle
 */
export function renderCompass(canvas: Canvas, heading: number, options: CompassOptions = {}): void {
  const { color = LIGHT } = options;
  const { profile } = canvas;
  const h = normalizeHeading(heading);
  const layout = compassLayout(profile);
  const center = profile.center;

  canvas.circle(center.x, center.y, layout.roseRadius, DARK);
  canvas.circle(center.x, center.y, layout.innerRadius, DARK);

  for (const [label, angle] of CARDINALS) {
    const at = polar(center, layout.labelRadius, angle);
    drawText(
      canvas,
      label,
      at.x - CHAR_W / 2,
      at.y - CHAR_H / 2,
      label === "N" ? WHITE : GRAY
    );
  }

  for (let angle = 0; angle < 360; angle += 45) {
    const inner = polar(center, layout.roseRadius - TICK_LENGTH, angle);
    const outer = polar(center, layout.roseRadius, angle);
    canvas.line(inner.x, inner.y, outer.x, outer.y, angle % 90 === 0 ? LIGHT : DARK);
  }

  const tip = polar(center, layout.needleLength, h);
  const tail = polar(center, layout.needleLength, h + 180);
  const side = polar({ x: 0, y: 0 }, NEEDLE_HALF_WIDTH, h + 90);

  canvas.fillTriangle(
    tip.x, tip.y,
    center.x - side.x, center.y - side.y,
    center.x + side.x, center.y + side.y,
    color
  );
  canvas.fillTriangle(
    tail.x, tail.y,
    center.x - side.x, center.y - side.y,
    center.x + side.x, center.y + side.y,
    DARK
  );
  canvas.fillCircle(center.x, center.y, PIVOT_RADIUS, GRAY);
}
