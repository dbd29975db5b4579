/**
 * Helpers shared by widget renderers
 */

import { InvalidRangeError, TextTooLongError, type Point } from "@roundscreen/core";

/**
 * Text for a numeric or preformatted value
 */
export function formatValue(value: number | string): string {
  if (typeof value === "string") return value;
  if (!Number.isFinite(value)) {
    throw new InvalidRangeError(`Value must be finite, got ${value}`);
  }
  return String(value);
}

export function assertFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidRangeError(`${name} must be finite, got ${value}`);
  }
}

export function assertMaxLength(text: string, maxChars: number): void {
  if (text.length > maxChars) {
    throw new TextTooLongError(text, maxChars);
  }
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Point at `length` from `center` in compass convention:
 * 0 degrees is up, angles increase clockwise.
 */
export function polar(center: Point, length: number, degrees: number): Point {
  const rad = (degrees * Math.PI) / 180;
  return {
    x: center.x + Math.round(length * Math.sin(rad)),
    y: center.y - Math.round(length * Math.cos(rad)),
  };
}
