/**
 * Tests for the tutorial scenarios
 */

import { describe, it, expect } from "vitest";
import { GREEN, RED, findInkBounds, isInsideDisc } from "@roundscreen/core";
import { encodePreview, isOutputFormat, renderScenario } from "./render.js";
import { SCENARIOS, comfortLabel, findScenario, moodForDistance } from "./scenarios.js";

describe("SCENARIOS", () => {
  it("has unique ids", () => {
    const ids = SCENARIOS.map((s) => s.id);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it("covers every face expression", () => {
    const faces = SCENARIOS.filter((s) => s.id.startsWith("08_smiley_")).map((s) => s.id);
    expect(faces).toHaveLength(7);
  });

  for (const scenario of SCENARIOS) {
    for (const device of ["ssd1327", "gc9a01"] as const) {
      it(`renders ${scenario.id} on ${device} without warnings`, () => {
        const result = renderScenario(scenario, device);
        expect(result.warnings).toEqual([]);
        expect(findInkBounds(result.frame)).not.toBeNull();
      });

      it(`keeps ${scenario.id} inside the disc on ${device}`, () => {
        const { frame, inkOutsideDisc } = renderScenario(scenario, device);
        expect(inkOutsideDisc).toBe(0);
        let outside = 0;
        for (let y = 0; y < frame.height; y++) {
          for (let x = 0; x < frame.width; x++) {
            if (frame.pixels[y * frame.width + x] !== 0 && !isInsideDisc(frame, x, y)) outside++;
          }
        }
        expect(outside).toBe(0);
      });
    }
  }
});

describe("findScenario", () => {
  it("looks scenarios up by id", () => {
    expect(findScenario("09_watch")?.title).toBe("Analog Watch");
    expect(findScenario("nope")).toBeUndefined();
  });
});

describe("comfortLabel", () => {
  it("classifies temperature and humidity", () => {
    expect(comfortLabel(22, 45)).toBe("Comfy");
    expect(comfortLabel(15, 45)).toBe("Dry/cold");
    expect(comfortLabel(22, 10)).toBe("Dry/cold");
    expect(comfortLabel(30, 70)).toBe("Not comfy");
  });
});

describe("moodForDistance", () => {
  it("maps distance bands to expressions", () => {
    expect(moodForDistance(20).expression).toBe("surprised");
    expect(moodForDistance(120)).toEqual({ expression: "happy", label: "HAPPY", color: GREEN });
    expect(moodForDistance(200).expression).toBe("sleeping");
    expect(moodForDistance(500)).toEqual({ expression: "sad", label: "SAD", color: RED });
  });
});

describe("encodePreview", () => {
  it("names ascii output after scenario and device", () => {
    const scenario = SCENARIOS[0];
    const preview = encodePreview(renderScenario(scenario, "ssd1327"), { format: "ascii", mask: true });
    expect(preview.fileName).toBe("01_temperature_ssd1327.txt");
    expect(typeof preview.data).toBe("string");
  });

  it("writes pgm for grayscale and ppm for color", () => {
    const scenario = SCENARIOS[0];
    const gray = encodePreview(renderScenario(scenario, "ssd1327"), { format: "pnm", mask: true });
    const color = encodePreview(renderScenario(scenario, "gc9a01"), { format: "pnm", mask: false });
    expect(gray.fileName).toBe("01_temperature_ssd1327.pgm");
    expect(color.fileName).toBe("01_temperature_gc9a01.ppm");
    // header + one byte per pixel / three bytes per pixel
    expect(gray.data.length).toBe("P5\n128 128\n255\n".length + 128 * 128);
    expect(color.data.length).toBe("P6\n240 240\n255\n".length + 240 * 240 * 3);
  });

  it("writes the panel byte layout for packed output", () => {
    const scenario = SCENARIOS[0];
    const gray = encodePreview(renderScenario(scenario, "ssd1327"), { format: "packed", mask: true });
    const color = encodePreview(renderScenario(scenario, "gc9a01"), { format: "packed", mask: true });
    expect(gray.fileName).toBe("01_temperature_ssd1327.bin");
    expect(gray.data.length).toBe(8192);
    expect(color.data.length).toBe(115200);
  });
});

describe("isOutputFormat", () => {
  it("accepts ascii, pnm and packed", () => {
    expect(isOutputFormat("ascii")).toBe(true);
    expect(isOutputFormat("packed")).toBe(true);
    expect(isOutputFormat("png")).toBe(false);
  });
});
