/**
 * Backend capability set
 *
 * The drawing surface a physical panel (or the simulator) provides. Colors
 * arriving here are already native; the color model runs before any call.
 */

import type { Bitmap, ColorDepth, NativeColor, NativeFrame } from "./types.js";

export interface Backend {
  readonly width: number;
  readonly height: number;

  /** Encoding used by the color model for this surface */
  colorDepth(): ColorDepth;

  setPixel(x: number, y: number, color: NativeColor): void;
  drawLine(x0: number, y0: number, x1: number, y1: number, color: NativeColor): void;
  fillRect(x: number, y: number, w: number, h: number, color: NativeColor): void;
  drawRect(x: number, y: number, w: number, h: number, color: NativeColor): void;
  drawHLine(x: number, y: number, w: number, color: NativeColor): void;
  drawVLine(x: number, y: number, h: number, color: NativeColor): void;
  blit(bitmap: Bitmap, x: number, y: number): void;

  /** Zero the frame buffer */
  clearBuffer(): void;

  /** Flush the frame buffer to the physical or simulated surface */
  present(): void;
}

/**
 * Receives each presented frame. Transport to a real panel (SPI writes)
 * lives behind this callback.
 */
export type FrameSink = (frame: NativeFrame) => void;
