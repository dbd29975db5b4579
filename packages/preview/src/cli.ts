#!/usr/bin/env node
/**
 * Round screen preview CLI
 */

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { program } from "commander";
import { isScreenError } from "@roundscreen/core";
import { loadConfig, parseDevice, type PreviewConfig } from "./config.js";
import {
  OUTPUT_FORMATS,
  encodePreview,
  isOutputFormat,
  renderScenario,
  type OutputFormat,
} from "./render.js";
import { SCENARIOS, findScenario, type Scenario } from "./scenarios.js";

interface RenderFlags {
  device?: string;
  format: string;
  out?: string;
  mask: boolean;
}

function resolveFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new Error(`--format must be one of ${OUTPUT_FORMATS.join(", ")}, got "${value}"`);
  }
  return value;
}

function writePreview(scenario: Scenario, config: PreviewConfig, flags: RenderFlags): void {
  const device = flags.device ? parseDevice("--device", flags.device) : config.device;
  const format = resolveFormat(flags.format);
  const result = renderScenario(scenario, device);
  const preview = encodePreview(result, { format, mask: flags.mask && config.mask });

  for (const warning of result.warnings) {
    console.warn(warning);
  }
  if (result.inkOutsideDisc > 0) {
    console.warn(`[preview] ${scenario.id}: ${result.inkOutsideDisc} pixels fall outside the visible disc`);
  }

  if (format === "ascii" && !flags.out) {
    console.log(preview.data);
    return;
  }

  const outDir = flags.out ?? config.outDir;
  mkdirSync(outDir, { recursive: true });
  const path = join(outDir, preview.fileName);
  writeFileSync(path, preview.data);
  console.log(`  ${scenario.id} -> ${path}`);
}

function run(action: () => void): void {
  try {
    action();
  } catch (error) {
    if (isScreenError(error)) {
      console.error(`Render error [${error.code}]: ${error.message}`);
    } else {
      console.error("Preview error:", error instanceof Error ? error.message : error);
    }
    process.exit(1);
  }
}

const config = loadConfig();

program
  .name("roundscreen-preview")
  .description("Render widget scenarios on simulated round displays")
  .version("0.1.0");

program
  .command("list")
  .description("List available scenarios")
  .action(() => {
    for (const scenario of SCENARIOS) {
      console.log(`  ${scenario.id.padEnd(22)} ${scenario.widget}`);
    }
  });

program
  .command("render <scenario>")
  .description("Render one scenario")
  .option("--device <id>", "ssd1327 or gc9a01")
  .option("--format <format>", "ascii, pnm or packed", "ascii")
  .option("--out <dir>", "Write to a directory instead of stdout")
  .option("--no-mask", "Keep pixels outside the visible disc")
  .action((id: string, flags: RenderFlags) => {
    run(() => {
      const scenario = findScenario(id);
      if (!scenario) {
        throw new Error(`Unknown scenario "${id}" (run "list" to see all)`);
      }
      writePreview(scenario, config, flags);
    });
  });

program
  .command("render-all")
  .description("Render every scenario on both devices")
  .option("--format <format>", "ascii, pnm or packed", "pnm")
  .option("--out <dir>", "Output directory")
  .option("--no-mask", "Keep pixels outside the visible disc")
  .action((flags: RenderFlags) => {
    run(() => {
      const outDir = flags.out ?? config.outDir;
      console.log(`Rendering ${SCENARIOS.length} scenarios into ${outDir}/`);
      for (const device of ["ssd1327", "gc9a01"]) {
        for (const scenario of SCENARIOS) {
          writePreview(scenario, config, { ...flags, device, out: outDir });
        }
      }
    });
  });

program.parse();
