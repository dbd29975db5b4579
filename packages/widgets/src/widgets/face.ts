/**
 * Pixel-art expression faces
 *
 * Each expression is an 8x8 grid from assets/faces.json, blown up to
 * width*11/128 pixels per cell (88px on 128, 160px on 240) and centered on
 * the screen. The compact variant uses width*7/128 and is centered in the
 * content zone, leaving the title and subtitle rows free.
 */

import { readFileSync } from "fs";
import {
  LIGHT,
  UnknownExpressionError,
  contentZone,
  type GeometryProfile,
  type RGB,
} from "@roundscreen/core";
import type { Canvas } from "../canvas.js";

export const FACE_EXPRESSIONS = ["happy", "sad", "surprised", "sleeping", "angry", "love"] as const;

export type FaceExpression = (typeof FACE_EXPRESSIONS)[number];

export const FACE_CELL_RATIO = 11;
export const COMPACT_CELL_RATIO = 7;
const REFERENCE_WIDTH = 128;

export interface FaceOptions {
  color?: RGB;
  compact?: boolean;
}

export interface FaceLayout {
  cell: number;
  size: number;
  x: number;
  y: number;
}

type FaceGrid = ReadonlyArray<ReadonlyArray<boolean>>;

function isRowList(value: unknown, size: number): value is string[] {
  return (
    Array.isArray(value) &&
    value.length === size &&
    value.every((row: unknown) => typeof row === "string" && /^[.#]+$/.test(row) && row.length === size)
  );
}

function loadFaces(): { gridSize: number; grids: Map<string, FaceGrid> } {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../assets/faces.json", import.meta.url), "utf-8")
  );
  if (
    typeof raw !== "object" ||
    raw === null ||
    !("gridSize" in raw) ||
    typeof raw.gridSize !== "number" ||
    !("expressions" in raw) ||
    typeof raw.expressions !== "object" ||
    raw.expressions === null
  ) {
    throw new Error("faces.json is malformed");
  }

  const gridSize = raw.gridSize;
  const grids = new Map<string, FaceGrid>();
  for (const [name, rows] of Object.entries(raw.expressions)) {
    if (!isRowList(rows, gridSize)) {
      throw new Error(`faces.json: expression "${name}" is not a ${gridSize}x${gridSize} grid`);
    }
    grids.set(name, rows.map((row) => [...row].map((c) => c === "#")));
  }
  return { gridSize, grids };
}

const FACES = loadFaces();

export function isFaceExpression(value: string): value is FaceExpression {
  return FACE_EXPRESSIONS.some((name) => name === value);
}

export function faceGrid(expression: string): FaceGrid {
  const grid = isFaceExpression(expression) ? FACES.grids.get(expression) : undefined;
  if (!grid) {
    throw new UnknownExpressionError(expression);
  }
  return grid;
}

export function faceLayout(profile: GeometryProfile, compact: boolean = false): FaceLayout {
  const ratio = compact ? COMPACT_CELL_RATIO : FACE_CELL_RATIO;
  const cell = Math.floor((profile.width * ratio) / REFERENCE_WIDTH);
  const size = cell * FACES.gridSize;
  const zone = contentZone(profile);
  const midY = compact ? Math.floor((zone.top + zone.bottom) / 2) : profile.center.y;
  return {
    cell,
    size,
    x: profile.center.x - Math.floor(size / 2),
    y: midY - Math.floor(size / 2),
  };
}

/**
 * Render an expression face
 */
export function renderFace(canvas: Canvas, expression: string, options: FaceOptions = {}): void {
  const { color = LIGHT, compact = false } = options;
  const grid = faceGrid(expression);
  const layout = faceLayout(canvas.profile, compact);
  canvas.blitMask(grid, layout.x, layout.y, layout.cell, color);
}
