/**
 * Preview configuration
 *
 * Read from .env (via dotenv) and the process environment:
 *   ROUNDSCREEN_DEVICE   ssd1327 | gc9a01   (default: ssd1327)
 *   ROUNDSCREEN_OUT_DIR  output directory   (default: previews)
 *   ROUNDSCREEN_MASK     true | false       (default: true)
 */

import { config as loadDotenv } from "dotenv";
import { DEVICES, isDeviceId, type DeviceId } from "@roundscreen/core";

export interface PreviewConfig {
  device: DeviceId;
  outDir: string;
  mask: boolean;
}

export const DEFAULT_CONFIG: PreviewConfig = {
  device: "ssd1327",
  outDir: "previews",
  mask: true,
};

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(`${name} must be true or false, got "${value}"`);
}

export function parseDevice(name: string, value: string): DeviceId {
  const normalized = value.trim().toLowerCase();
  if (!isDeviceId(normalized)) {
    throw new Error(`${name} must be one of ${Object.keys(DEVICES).join(", ")}, got "${value}"`);
  }
  return normalized;
}

/**
 * Build a config from environment variables, falling back to defaults
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PreviewConfig {
  const device = env.ROUNDSCREEN_DEVICE
    ? parseDevice("ROUNDSCREEN_DEVICE", env.ROUNDSCREEN_DEVICE)
    : DEFAULT_CONFIG.device;
  const outDir = env.ROUNDSCREEN_OUT_DIR?.trim() || DEFAULT_CONFIG.outDir;
  const mask = env.ROUNDSCREEN_MASK
    ? parseBoolean("ROUNDSCREEN_MASK", env.ROUNDSCREEN_MASK)
    : DEFAULT_CONFIG.mask;
  return { device, outDir, mask };
}

/**
 * Load .env into process.env (existing variables win), then read config
 */
export function loadConfig(path?: string): PreviewConfig {
  loadDotenv({ path });
  return configFromEnv(process.env);
}
