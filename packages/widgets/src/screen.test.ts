/**
 * Tests for the frame controller
 */

import { describe, it, expect, vi } from "vitest";
import {
  PROFILE_240,
  TextTooLongError,
  createSimulatedDisplay,
  findInkBounds,
  type NativeFrame,
} from "@roundscreen/core";
import { Screen } from "./screen.js";

function setup() {
  const frames: NativeFrame[] = [];
  const backend = createSimulatedDisplay("ssd1327", (frame) => frames.push(frame));
  const logger = { warn: vi.fn<(message: string) => void>() };
  const screen = new Screen(backend, { logger });
  return { backend, frames, logger, screen };
}

describe("Screen", () => {
  it("derives its profile from the backend", () => {
    const { screen } = setup();
    expect(screen.profile.width).toBe(128);
    expect(screen.profile.charsPerLine).toBe(16);
  });

  it("rejects a profile that does not match the backend", () => {
    const backend = createSimulatedDisplay("ssd1327");
    expect(() => new Screen(backend, { profile: PROFILE_240 })).toThrow("does not match backend");
  });

  it("moves through idle, cleared and drawing", () => {
    const { screen } = setup();
    expect(screen.state).toBe("idle");
    screen.clear();
    expect(screen.state).toBe("cleared");
    screen.title("Menu");
    expect(screen.state).toBe("drawing");
    screen.present();
    expect(screen.state).toBe("idle");
  });

  it("presents identical frames twice in a row", () => {
    const { screen, frames } = setup();
    screen.clear();
    screen.gauge(42);
    screen.present();
    screen.present();
    expect(frames).toHaveLength(2);
    expect(Array.from(frames[1].pixels)).toEqual(Array.from(frames[0].pixels));
  });

  it("keeps the previous frame when drawing without clear", () => {
    const { screen, frames, logger } = setup();
    screen.clear();
    screen.title("A");
    screen.present();
    screen.pixel(0, 64);
    screen.present();

    expect(findInkBounds(frames[1], undefined, { minX: 60, minY: 20, maxX: 65, maxY: 26 })).toEqual({
      minX: 60,
      minY: 20,
      maxX: 65,
      maxY: 26,
    });
    expect(logger.warn).toHaveBeenCalledWith(
      "[screen] Drawing without clear(): previous frame content is retained"
    );
  });

  it("clears the whole buffer", () => {
    const { screen, frames } = setup();
    screen.clear();
    screen.face("happy");
    screen.present();
    screen.clear();
    screen.present();
    expect(findInkBounds(frames[1])).toBeNull();
  });

  it("warns when an immersive widget follows content", () => {
    const { screen, logger } = setup();
    screen.clear();
    screen.value(42);
    screen.compass(0);
    expect(screen.layoutWarnings).toEqual([
      {
        widget: "compass",
        after: "value",
        message: 'Immersive widget "compass" drawn after content widget "value"; expect overlap',
      },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("does not warn for chrome over immersive widgets", () => {
    const { screen } = setup();
    screen.clear();
    screen.gauge(342, 0, 500, { unit: "mm" });
    screen.title("Distance");
    screen.clear();
    screen.compass(90);
    screen.title("Heading");
    expect(screen.layoutWarnings).toEqual([]);
  });

  it("treats a compact face as content", () => {
    const { screen } = setup();
    screen.clear();
    screen.title("Mood");
    screen.face("happy", { compact: true });
    expect(screen.layoutWarnings).toEqual([]);
    screen.face("sad");
    expect(screen.layoutWarnings.map((w) => w.widget)).toEqual(["face"]);
  });

  it("resets warnings on clear", () => {
    const { screen } = setup();
    screen.clear();
    screen.title("A");
    screen.watch(10, 10, 30);
    expect(screen.layoutWarnings).toHaveLength(1);
    screen.clear();
    expect(screen.layoutWarnings).toEqual([]);
  });

  it("leaves the buffer untouched when a widget rejects its input", () => {
    const { screen, backend } = setup();
    screen.clear();
    expect(() => screen.title("This title is too long")).toThrow(TextTooLongError);
    expect(findInkBounds(backend.frame)).toBeNull();
  });

  it("does not record a widget that threw as drawn content", () => {
    const { screen, logger } = setup();
    screen.clear();
    expect(() => screen.title("THIS TITLE IS WAY TOO LONG TO FIT")).toThrow(TextTooLongError);
    expect(screen.state).toBe("cleared");
    screen.compass(0);
    expect(screen.layoutWarnings).toEqual([]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("keeps the idle state when the first draw after present fails", () => {
    const { screen, logger } = setup();
    screen.present();
    expect(() => screen.subtitle([])).toThrow();
    expect(screen.state).toBe("idle");
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("places free text at an anchor or explicit position", () => {
    const { screen, backend } = setup();
    screen.clear();
    screen.text("A", { at: "CENTER" });
    expect(findInkBounds(backend.frame)).toEqual({ minX: 60, minY: 60, maxX: 65, maxY: 66 });

    screen.clear();
    screen.text("A", { x: 0, y: 0 });
    expect(findInkBounds(backend.frame)).toEqual({ minX: 0, minY: 0, maxX: 5, maxY: 6 });
  });

  it("draws filled and outlined primitives", () => {
    const { screen, backend } = setup();
    screen.clear();
    screen.rect(10, 10, 4, 4, undefined, true);
    screen.circle(64, 64, 5);
    screen.line(0, 100, 3, 100);
    expect(findInkBounds(backend.frame, undefined, { minX: 0, minY: 0, maxX: 20, maxY: 20 })).toEqual({
      minX: 10,
      minY: 10,
      maxX: 13,
      maxY: 13,
    });
    expect(findInkBounds(backend.frame, undefined, { minX: 50, minY: 50, maxX: 80, maxY: 80 })).toEqual({
      minX: 59,
      minY: 59,
      maxX: 69,
      maxY: 69,
    });
  });
});
