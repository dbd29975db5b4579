/**
 * Fixed 8x8 bitmap font, printable ASCII (0x20-0x7E) only.
 *
 * Glyph data lives in assets/font8x8.json: one 16-digit hex string per
 * glyph, one byte per row, bit 0 is the leftmost pixel.
 */

import { readFileSync } from "fs";
import { UnsupportedGlyphError } from "@roundscreen/core";

interface FontFile {
  cellWidth: number;
  cellHeight: number;
  firstCode: number;
  lastCode: number;
  glyphs: string[];
}

function isFontFile(value: unknown): value is FontFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "cellWidth" in value &&
    typeof value.cellWidth === "number" &&
    "cellHeight" in value &&
    typeof value.cellHeight === "number" &&
    "firstCode" in value &&
    typeof value.firstCode === "number" &&
    "lastCode" in value &&
    typeof value.lastCode === "number" &&
    "glyphs" in value &&
    Array.isArray(value.glyphs) &&
    value.glyphs.every((g: unknown) => typeof g === "string" && /^[0-9A-F]{16}$/.test(g))
  );
}

function loadFont(): { firstCode: number; lastCode: number; rows: Uint8Array[] } {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("./assets/font8x8.json", import.meta.url), "utf-8")
  );
  if (!isFontFile(raw) || raw.glyphs.length !== raw.lastCode - raw.firstCode + 1) {
    throw new Error("font8x8.json is malformed");
  }
  const rows = raw.glyphs.map((hex) => {
    const bytes = new Uint8Array(8);
    for (let i = 0; i < 8; i++) {
      bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
    }
    return bytes;
  });
  return { firstCode: raw.firstCode, lastCode: raw.lastCode, rows };
}

const FONT = loadFont();

export function isPrintable(char: string): boolean {
  const code = char.codePointAt(0);
  return (
    char.length === 1 && code !== undefined && code >= FONT.firstCode && code <= FONT.lastCode
  );
}

/**
 * Throw UnsupportedGlyphError on the first character the font cannot draw
 */
export function assertPrintable(text: string): void {
  for (const char of text) {
    if (!isPrintable(char)) {
      throw new UnsupportedGlyphError(char);
    }
  }
}

/**
 * The 8 row bytes of a glyph
 */
export function glyphRows(char: string): Uint8Array {
  if (!isPrintable(char)) {
    throw new UnsupportedGlyphError(char);
  }
  return FONT.rows[char.charCodeAt(0) - FONT.firstCode];
}

/**
 * Whether the font pixel at (col, row) of a glyph is set
 */
export function glyphBit(rows: Uint8Array, col: number, row: number): boolean {
  return ((rows[row] >> col) & 1) === 1;
}
