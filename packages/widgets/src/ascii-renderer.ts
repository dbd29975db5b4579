/**
 * ASCII renderer for debugging frame output
 * Converts a native frame to ASCII art for terminal/text visualization
 */

import { isInsideDisc, nativeBrightness, type NativeFrame } from "@roundscreen/core";

export interface AsciiOptions {
  /** Leave pixels outside the visible disc blank (default: false) */
  mask?: boolean;
  /** Draw a box around the output (default: true) */
  border?: boolean;
}

/**
 * Get ASCII character for a pixel brightness (0-255)
 */
export function charForBrightness(brightness: number): string {
  if (brightness < 5) return " ";
  if (brightness < 50) return "·";
  if (brightness < 100) return "░";
  if (brightness < 150) return "▒";
  if (brightness < 200) return "▓";
  return "█";
}

/**
 * Convert a frame to ASCII art, one character per pixel
 */
export function frameToAscii(frame: NativeFrame, options: AsciiOptions = {}): string {
  const { mask = false, border = true } = options;
  const lines: string[] = [];

  if (border) lines.push("┌" + "─".repeat(frame.width) + "┐");

  for (let y = 0; y < frame.height; y++) {
    let line = "";
    for (let x = 0; x < frame.width; x++) {
      if (mask && !isInsideDisc(frame, x, y)) {
        line += " ";
        continue;
      }
      const native = frame.pixels[y * frame.width + x];
      line += charForBrightness(nativeBrightness(native, frame.depth));
    }
    lines.push(border ? "│" + line + "│" : line);
  }

  if (border) lines.push("└" + "─".repeat(frame.width) + "┘");

  return lines.join("\n");
}
