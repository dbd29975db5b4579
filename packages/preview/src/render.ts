/**
 * Render scenarios on a simulated display
 */

import {
  countInkOutsideDisc,
  createSimulatedDisplay,
  encodeNetpbm,
  netpbmExtension,
  packFrame,
  type DeviceId,
  type NativeFrame,
} from "@roundscreen/core";
import { Screen, frameToAscii } from "@roundscreen/widgets";
import type { Scenario } from "./scenarios.js";

/** packed: the panel's native byte layout, as a transport would send it */
export type OutputFormat = "ascii" | "pnm" | "packed";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["ascii", "pnm", "packed"];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface RenderResult {
  scenario: Scenario;
  device: DeviceId;
  frame: NativeFrame;
  /** Composition warnings the frame raised */
  warnings: string[];
  /** Lit pixels the panel's bezel would hide */
  inkOutsideDisc: number;
}

/**
 * Run one clear / draw / present cycle and capture the presented frame
 */
export function renderScenario(scenario: Scenario, device: DeviceId): RenderResult {
  const frames: NativeFrame[] = [];
  const warnings: string[] = [];
  const backend = createSimulatedDisplay(device, (frame) => frames.push(frame));
  const screen = new Screen(backend, {
    logger: { warn: (message: string) => warnings.push(message) },
  });

  screen.clear();
  scenario.draw(screen);
  screen.present();

  const frame = frames.at(-1);
  if (!frame) {
    throw new Error(`Scenario ${scenario.id} presented no frame`);
  }
  return { scenario, device, frame, warnings, inkOutsideDisc: countInkOutsideDisc(frame) };
}

export interface EncodeOptions {
  format: OutputFormat;
  mask: boolean;
}

export interface EncodedPreview {
  fileName: string;
  data: Uint8Array | string;
}

export function encodePreview(result: RenderResult, options: EncodeOptions): EncodedPreview {
  const base = `${result.scenario.id}_${result.device}`;
  if (options.format === "ascii") {
    return {
      fileName: `${base}.txt`,
      data: frameToAscii(result.frame, { mask: options.mask }) + "\n",
    };
  }
  if (options.format === "packed") {
    return { fileName: `${base}.bin`, data: packFrame(result.frame) };
  }
  return {
    fileName: `${base}.${netpbmExtension(result.frame.depth)}`,
    data: encodeNetpbm(result.frame, { mask: options.mask }),
  };
}
