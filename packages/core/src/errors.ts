/**
 * Error taxonomy for drawing calls.
 *
 * Every error is local to the call that raised it. Nothing in the library
 * catches these; callers decide whether to skip the frame or abort.
 */

export type ScreenErrorCode =
  | "INVALID_COLOR"
  | "UNSUPPORTED_GLYPH"
  | "INVALID_SCALE"
  | "TEXT_TOO_LONG"
  | "INVALID_RANGE"
  | "INDEX_OUT_OF_RANGE"
  | "UNKNOWN_EXPRESSION"
  | "TOO_MANY_LINES";

export class ScreenError extends Error {
  readonly code: ScreenErrorCode;

  constructor(code: ScreenErrorCode, message: string) {
    super(message);
    this.name = "ScreenError";
    this.code = code;
  }
}

export class InvalidColorError extends ScreenError {
  constructor(message: string) {
    super("INVALID_COLOR", message);
    this.name = "InvalidColorError";
  }
}

export class UnsupportedGlyphError extends ScreenError {
  readonly char: string;

  constructor(char: string) {
    const code = char.codePointAt(0) ?? 0;
    super("UNSUPPORTED_GLYPH", `Unsupported glyph U+${code.toString(16).toUpperCase().padStart(4, "0")}`);
    this.name = "UnsupportedGlyphError";
    this.char = char;
  }
}

export class InvalidScaleError extends ScreenError {
  constructor(scale: number, allowed: readonly number[]) {
    super("INVALID_SCALE", `Invalid text scale ${scale} (allowed: ${allowed.join(", ")})`);
    this.name = "InvalidScaleError";
  }
}

export class TextTooLongError extends ScreenError {
  readonly maxChars: number;

  /** `where` marks a line that fits the character limit but not the disc */
  constructor(text: string, maxChars: number, where?: string) {
    super(
      "TEXT_TOO_LONG",
      where
        ? `Text "${text}" does not fit inside the disc ${where}, about ${maxChars} chars fit`
        : `Text "${text}" is ${text.length} chars, max is ${maxChars}`
    );
    this.name = "TextTooLongError";
    this.maxChars = maxChars;
  }
}

export class InvalidRangeError extends ScreenError {
  constructor(message: string) {
    super("INVALID_RANGE", message);
    this.name = "InvalidRangeError";
  }
}

export class IndexOutOfRangeError extends ScreenError {
  constructor(index: number, length: number) {
    super("INDEX_OUT_OF_RANGE", `Index ${index} out of range for ${length} item(s)`);
    this.name = "IndexOutOfRangeError";
  }
}

export class UnknownExpressionError extends ScreenError {
  constructor(expression: string) {
    super("UNKNOWN_EXPRESSION", `Unknown face expression "${expression}"`);
    this.name = "UnknownExpressionError";
  }
}

export class TooManyLinesError extends ScreenError {
  constructor(count: number, max: number) {
    super("TOO_MANY_LINES", `Got ${count} lines, max is ${max}`);
    this.name = "TooManyLinesError";
  }
}

export function isScreenError(value: unknown): value is ScreenError {
  return value instanceof ScreenError;
}
