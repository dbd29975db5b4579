/**
 * Shared fixtures for widget tests
 */

import {
  PROFILE_128,
  PROFILE_240,
  createSimulatedDisplay,
  type FramebufferBackend,
  type GeometryProfile,
} from "@roundscreen/core";
import { Canvas } from "../../canvas.js";

export interface TestCanvas {
  canvas: Canvas;
  backend: FramebufferBackend;
}

export function grayCanvas(): TestCanvas {
  const backend = createSimulatedDisplay("ssd1327");
  return { canvas: new Canvas(backend, PROFILE_128), backend };
}

export function colorCanvas(): TestCanvas {
  const backend = createSimulatedDisplay("gc9a01");
  return { canvas: new Canvas(backend, PROFILE_240), backend };
}

export const PROFILES: ReadonlyArray<readonly [string, GeometryProfile]> = [
  ["128", PROFILE_128],
  ["240", PROFILE_240],
];

/** Native gray levels of the palette on the SSD1327 */
export const GRAY4 = { dark: 6, gray: 9, light: 11, white: 15 } as const;
