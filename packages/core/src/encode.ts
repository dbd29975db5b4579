/**
 * Frame encoders
 *
 * Wire format (what a panel transport would write):
 * - grayscale4: two pixels per byte, first pixel in the high nibble
 *   (128x128 -> 8,192 bytes)
 * - rgb565: two bytes per pixel, big-endian (240x240 -> 115,200 bytes)
 *
 * Preview format: binary netpbm, P5 for grayscale and P6 for color, with an
 * optional circular mask that blacks out pixels outside the visible disc.
 */

import { fromNative } from "./colors.js";
import { isInsideDisc } from "./geometry.js";
import type { NativeFrame, ColorDepth } from "./types.js";

/**
 * Pack a frame into the panel's native byte layout
 */
export function packFrame(frame: NativeFrame): Uint8Array {
  const { pixels } = frame;
  if (frame.depth === "grayscale4") {
    const bytes = new Uint8Array(Math.ceil(pixels.length / 2));
    for (let i = 0; i < pixels.length; i++) {
      const nibble = pixels[i] & 0x0f;
      bytes[i >> 1] |= i % 2 === 0 ? nibble << 4 : nibble;
    }
    return bytes;
  }
  const bytes = new Uint8Array(pixels.length * 2);
  for (let i = 0; i < pixels.length; i++) {
    bytes[i * 2] = pixels[i] >> 8;
    bytes[i * 2 + 1] = pixels[i] & 0xff;
  }
  return bytes;
}

export interface NetpbmOptions {
  /** Black out pixels outside the visible disc (default: true) */
  mask?: boolean;
}

/**
 * Encode a frame as binary PGM (grayscale4) or PPM (rgb565)
 */
export function encodeNetpbm(frame: NativeFrame, options: NetpbmOptions = {}): Uint8Array {
  const { mask = true } = options;
  const gray = frame.depth === "grayscale4";
  const channels = gray ? 1 : 3;
  const header = Buffer.from(`${gray ? "P5" : "P6"}\n${frame.width} ${frame.height}\n255\n`, "ascii");
  const body = new Uint8Array(frame.width * frame.height * channels);

  for (let y = 0; y < frame.height; y++) {
    for (let x = 0; x < frame.width; x++) {
      const i = y * frame.width + x;
      if (mask && !isInsideDisc(frame, x, y)) continue;
      const rgb = fromNative(frame.pixels[i], frame.depth);
      if (gray) {
        body[i] = rgb.r;
      } else {
        body[i * 3] = rgb.r;
        body[i * 3 + 1] = rgb.g;
        body[i * 3 + 2] = rgb.b;
      }
    }
  }

  return Buffer.concat([header, body]);
}

/** File extension matching encodeNetpbm output */
export function netpbmExtension(depth: ColorDepth): "pgm" | "ppm" {
  return depth === "grayscale4" ? "pgm" : "ppm";
}
