/**
 * Supported round panels and their simulated stand-ins
 */

import type { FrameSink } from "./backend.js";
import { FramebufferBackend } from "./framebuffer.js";
import { createProfile, type GeometryProfile } from "./geometry.js";
import type { ColorDepth } from "./types.js";

export type DeviceId = "ssd1327" | "gc9a01";

export interface DeviceInfo {
  id: DeviceId;
  name: string;
  size: number;
  depth: ColorDepth;
}

export const DEVICES: Readonly<Record<DeviceId, DeviceInfo>> = Object.freeze({
  ssd1327: { id: "ssd1327", name: "SSD1327 128x128 grayscale OLED", size: 128, depth: "grayscale4" },
  gc9a01: { id: "gc9a01", name: "GC9A01 240x240 RGB565 TFT", size: 240, depth: "rgb565" },
});

export function isDeviceId(value: string): value is DeviceId {
  return Object.prototype.hasOwnProperty.call(DEVICES, value);
}

export function deviceProfile(device: DeviceId): GeometryProfile {
  const info = DEVICES[device];
  return createProfile(info.size);
}

/**
 * In-memory backend with the resolution and color depth of a real panel
 */
export function createSimulatedDisplay(device: DeviceId, sink?: FrameSink): FramebufferBackend {
  const info = DEVICES[device];
  return new FramebufferBackend({
    width: info.size,
    height: info.size,
    depth: info.depth,
    sink,
  });
}
