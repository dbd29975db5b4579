/**
 * Scrolling line graph
 *
 * The plot area is fixed at y 38..90 (52px tall) on every screen size; only
 * its width follows the profile. Nominally it spans x 30 to width - 21,
 * narrowed to the disc chord over the plot rows. One pixel column per
 * sample: when more samples arrive than columns, the oldest are dropped.
 */

import {
  DARK,
  InvalidRangeError,
  LIGHT,
  discSpan,
  type GeometryProfile,
  type Point,
  type RGB,
} from "@roundscreen/core";
import type { Canvas } from "../canvas.js";
import { assertFinite, clamp } from "./shared.js";

export const GRAPH_TOP = 38;
export const GRAPH_HEIGHT = 52;
export const GRAPH_LEFT = 30;
/** Total horizontal space not used by the plot */
export const GRAPH_INSET = 50;

export interface GraphOptions {
  color?: RGB;
}

export interface GraphArea {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function graphArea(profile: GeometryProfile): GraphArea {
  // axes included: the x axis sits on row GRAPH_TOP + GRAPH_HEIGHT
  const chord = discSpan(profile, GRAPH_TOP, GRAPH_TOP + GRAPH_HEIGHT);
  const x = Math.max(GRAPH_LEFT, chord?.minX ?? profile.width);
  const right = Math.min(GRAPH_LEFT + profile.width - GRAPH_INSET - 1, chord?.maxX ?? -1);
  if (right - x < 1) {
    throw new InvalidRangeError(`A ${profile.width}px screen has no room for the graph`);
  }
  return { x, y: GRAPH_TOP, width: right - x + 1, height: GRAPH_HEIGHT };
}

/**
 * Most recent samples that fit in `capacity` columns
 */
export function visibleSamples(data: readonly number[], capacity: number): number[] {
  return data.length > capacity ? data.slice(data.length - capacity) : [...data];
}

/**
 * Pixel position of every visible sample. Samples are spread evenly from
 * the left axis to the right edge; a lone sample sits at the right edge.
 */
export function graphPoints(
  profile: GeometryProfile,
  data: readonly number[],
  minVal: number = 0,
  maxVal: number = 100
): Point[] {
  assertFinite("minVal", minVal);
  assertFinite("maxVal", maxVal);
  if (maxVal <= minVal) {
    throw new InvalidRangeError(`Graph needs minVal < maxVal, got ${minVal}..${maxVal}`);
  }
  data.forEach((v, i) => assertFinite(`data[${i}]`, v));

  const area = graphArea(profile);
  const samples = visibleSamples(data, area.width);
  const span = maxVal - minVal;
  const bottom = area.y + area.height;
  const n = samples.length;

  return samples.map((v, i) => {
    const x = n === 1 ? area.x + area.width - 1 : area.x + Math.floor((i * (area.width - 1)) / (n - 1));
    const ratio = (clamp(v, minVal, maxVal) - minVal) / span;
    return { x, y: bottom - Math.round(ratio * area.height) };
  });
}

/**
 * Render axes and the data line
 */
export function renderGraph(
  canvas: Canvas,
  data: readonly number[],
  minVal: number = 0,
  maxVal: number = 100,
  options: GraphOptions = {}
): void {
  const { color = LIGHT } = options;
  const points = graphPoints(canvas.profile, data, minVal, maxVal);
  const area = graphArea(canvas.profile);

  canvas.vline(area.x, area.y, area.height, DARK);
  canvas.hline(area.x, area.y + area.height, area.width, DARK);

  if (points.length === 1) {
    canvas.pixel(points[0].x, points[0].y, color);
    return;
  }
  for (let i = 1; i < points.length; i++) {
    canvas.line(points[i - 1].x, points[i - 1].y, points[i].x, points[i].y, color);
  }
}
