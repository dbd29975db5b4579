/**
 * Tutorial scenarios
 *
 * Each scenario draws one complete frame with fixed sample data, so the
 * output is reproducible and can be compared against reference mockups.
 * Subtitle text is short enough for the 128 chord near the rim: about ten
 * characters on the first line and five on the second.
 */

import { DARK, GREEN, LIGHT, RED, YELLOW, type RGB } from "@roundscreen/core";
import type { FaceExpression, Screen } from "@roundscreen/widgets";

export interface Scenario {
  id: string;
  title: string;
  /** Widget call the scenario demonstrates */
  widget: string;
  description: string;
  draw(screen: Screen): void;
}

function faceScenario(id: string, expression: FaceExpression, title: string): Scenario {
  return {
    id,
    title,
    widget: `screen.face("${expression}")`,
    description: `Full-screen ${expression} face expression`,
    draw(screen) {
      screen.face(expression);
    },
  };
}

/**
 * Comfort label from temperature (C) and relative humidity (%)
 */
export function comfortLabel(temp: number, humidity: number): string {
  if (temp >= 20 && temp <= 26 && humidity >= 30 && humidity <= 60) {
    return "Comfy";
  }
  if (temp < 18 || humidity < 20) {
    return "Dry/cold";
  }
  return "Not comfy";
}

/**
 * Expression, label and color for a distance reading in millimetres
 */
export function moodForDistance(distance: number): {
  expression: FaceExpression;
  label: string;
  color: RGB;
} {
  if (distance < 50) return { expression: "surprised", label: "SURPRISED", color: YELLOW };
  if (distance < 150) return { expression: "happy", label: "HAPPY", color: GREEN };
  if (distance < 300) return { expression: "sleeping", label: "SLEEPING", color: LIGHT };
  return { expression: "sad", label: "SAD", color: RED };
}

const LIGHT_SAMPLES = [120, 180, 260, 310, 420, 380, 450, 520, 610, 580, 640, 700, 660, 720, 810, 760, 690, 740, 800, 850];

export const SCENARIOS: readonly Scenario[] = [
  {
    id: "01_temperature",
    title: "Temperature",
    widget: "screen.value(temp, { unit })",
    description: "Temperature reading with unit",
    draw(screen) {
      screen.title("Temperature");
      screen.value(23.5, { unit: "C" });
      screen.subtitle("HTS221");
    },
  },
  {
    id: "02_battery",
    title: "Battery",
    widget: "screen.bar(soc)",
    description: "Battery state of charge",
    draw(screen) {
      const pct = 72;
      screen.title("Battery");
      screen.value(`${pct}%`, { yOffset: -15 });
      screen.bar(pct, 100, { yOffset: -12, color: GREEN });
      screen.subtitle(["BQ27441", "3.84V"]);
    },
  },
  {
    id: "03_comfort_dual",
    title: "Comfort",
    widget: "screen.value(..., { at: 'W' | 'E' })",
    description: "Temperature and humidity side by side with a comfort indicator",
    draw(screen) {
      const temp = 22;
      const humidity = 45;
      const { center } = screen.profile;
      screen.title("Comfort");
      screen.line(center.x, center.y - 32, center.x, center.y + 32, DARK);
      screen.value(temp, { unit: "C", at: "W", label: "TEMP" });
      screen.value(humidity, { unit: "%", at: "E", label: "HUM" });
      screen.subtitle(comfortLabel(temp, humidity), GREEN);
    },
  },
  {
    id: "04_circular_gauge",
    title: "Circular Gauge",
    widget: "screen.gauge(dist, min, max, { unit })",
    description: "Distance as a circular arc gauge",
    draw(screen) {
      screen.gauge(342, 0, 500, { unit: "mm" });
      screen.title("Distance");
      screen.subtitle("VL53L1X");
    },
  },
  {
    id: "05_scrolling_graph",
    title: "Scrolling Graph",
    widget: "screen.graph(data, min, max)",
    description: "Ambient light history as a scrolling line graph",
    draw(screen) {
      screen.title("Light (lux)");
      screen.graph(LIGHT_SAMPLES, 0, 1000);
      screen.subtitle(["APDS9960", "20s"]);
    },
  },
  {
    id: "06_dpad_menu",
    title: "D-pad Menu",
    widget: "screen.menu(items, selected)",
    description: "Scrollable menu with the selection highlighted",
    draw(screen) {
      screen.title("Menu");
      screen.menu(["Temperature", "Humidity", "Distance", "Light", "Battery", "Proximity"], 2);
    },
  },
  {
    id: "07_compass",
    title: "Compass",
    widget: "screen.compass(heading)",
    description: "Compass rose with heading needle and cardinal labels",
    draw(screen) {
      screen.compass(0);
    },
  },
  faceScenario("08_smiley_happy", "happy", "Smiley - Happy"),
  faceScenario("08_smiley_sad", "sad", "Smiley - Sad"),
  faceScenario("08_smiley_surprised", "surprised", "Smiley - Surprised"),
  faceScenario("08_smiley_angry", "angry", "Smiley - Angry"),
  faceScenario("08_smiley_love", "love", "Smiley - Love"),
  faceScenario("08_smiley_sleeping", "sleeping", "Smiley - Sleeping"),
  {
    id: "08_smiley_reactive",
    title: "Smiley - Reactive",
    widget: "screen.face(mood, { compact: true })",
    description: "Compact face with title and mood label",
    draw(screen) {
      const distance = 120;
      const mood = moodForDistance(distance);
      screen.title("Mood");
      screen.face(mood.expression, { color: mood.color, compact: true });
      screen.subtitle([mood.label, `${distance}mm`], mood.color);
    },
  },
  {
    id: "09_watch",
    title: "Analog Watch",
    widget: "screen.watch(hours, minutes, seconds)",
    description: "Analog watch face with hour, minute and second hands",
    draw(screen) {
      screen.watch(10, 10, 30);
    },
  },
];

export function findScenario(id: string): Scenario | undefined {
  return SCENARIOS.find((s) => s.id === id);
}
