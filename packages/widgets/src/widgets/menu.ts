/**
 * Scrollable list menu
 *
 * Rows start at y=35 with a 14px pitch. When there are more items than
 * rows, the window scrolls so the selection stays visible, centered where
 * possible. The selection state is owned by the caller.
 *
 * Each row's highlight and text are clipped to the disc chord over the
 * row's 14px band; labels longer than the clipped row are cut at a whole
 * character.
 */

import {
  CHAR_W,
  DARK,
  GRAY,
  IndexOutOfRangeError,
  WHITE,
  discSpan,
  type GeometryProfile,
  type RGB,
} from "@roundscreen/core";
import type { Canvas } from "../canvas.js";
import { assertPrintable } from "../font.js";
import { drawText } from "../text.js";
import { assertMaxLength } from "./shared.js";

export const MENU_TOP = 35;
export const MENU_ROW_PITCH = 14;
export const MENU_TEXT_X = 18;
export const MENU_HIGHLIGHT_INSET = 15;
/** Vertical space reserved for chrome when counting rows */
export const MENU_RESERVED_HEIGHT = 40;
const MARKER_WIDTH = 2;

export interface MenuOptions {
  color?: RGB;
}

export interface MenuRow {
  /** Top of the text */
  y: number;
  highlightX: number;
  highlightWidth: number;
  textX: number;
  /** Characters that fit, marker included */
  maxChars: number;
}

export function visibleRowCount(profile: GeometryProfile): number {
  return Math.floor((profile.height - MENU_RESERVED_HEIGHT) / MENU_ROW_PITCH);
}

/**
 * First visible item index and number of visible items
 */
export function menuWindow(
  itemCount: number,
  selectedIndex: number,
  rows: number
): { start: number; count: number } {
  const count = Math.min(itemCount, rows);
  const start = Math.max(0, Math.min(selectedIndex - Math.floor(count / 2), itemCount - count));
  return { start, count };
}

/**
 * Layout of the visible row at `row`, or null when the band misses the disc
 */
export function menuRow(profile: GeometryProfile, row: number): MenuRow | null {
  const y = MENU_TOP + row * MENU_ROW_PITCH;
  const top = y - 2;
  const chord = discSpan(profile, top, top + MENU_ROW_PITCH - 1);
  if (!chord) return null;
  const highlightX = Math.max(MENU_HIGHLIGHT_INSET, chord.minX);
  const right = Math.min(profile.width - MENU_HIGHLIGHT_INSET - 1, chord.maxX);
  const textX = highlightX + MENU_TEXT_X - MENU_HIGHLIGHT_INSET;
  return {
    y,
    highlightX,
    highlightWidth: Math.max(0, right - highlightX + 1),
    textX,
    maxChars: Math.max(0, Math.floor((right - textX + 1) / CHAR_W)),
  };
}

export function assertSelection(items: readonly string[], selectedIndex: number): void {
  if (!Number.isInteger(selectedIndex) || selectedIndex < 0 || selectedIndex >= items.length) {
    throw new IndexOutOfRangeError(selectedIndex, items.length);
  }
}

/**
 * Render the visible window of items, highlighting the selection
 */
export function renderMenu(
  canvas: Canvas,
  items: readonly string[],
  selectedIndex: number,
  options: MenuOptions = {}
): void {
  const { color = WHITE } = options;
  const { profile } = canvas;
  assertSelection(items, selectedIndex);
  for (const item of items) {
    assertMaxLength(item, profile.charsPerLine - MARKER_WIDTH);
    assertPrintable(item);
  }

  const { start, count } = menuWindow(items.length, selectedIndex, visibleRowCount(profile));
  for (let i = start; i < start + count; i++) {
    const row = menuRow(profile, i - start);
    if (!row) continue;
    if (i === selectedIndex) {
      canvas.fillRect(row.highlightX, row.y - 2, row.highlightWidth, MENU_ROW_PITCH, DARK);
      drawText(canvas, `> ${items[i]}`.slice(0, row.maxChars), row.textX, row.y, color);
    } else {
      drawText(canvas, `  ${items[i]}`.slice(0, row.maxChars), row.textX, row.y, GRAY);
    }
  }
}
