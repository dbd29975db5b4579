/**
 * Frame controller
 *
 * Owns a backend and drives the per-frame cycle:
 *
 *   screen.clear();        // idle -> cleared
 *   screen.title("Menu");  // -> drawing
 *   screen.menu(items, i);
 *   screen.present();      // -> idle
 *
 * Nothing is cleared implicitly. Drawing without clear() stacks on top of
 * the previous frame; present() twice re-sends the same buffer.
 */

import {
  InvalidRangeError,
  WHITE,
  createProfile,
  type Backend,
  type GeometryProfile,
  type RGB,
} from "@roundscreen/core";
import { Canvas } from "./canvas.js";
import { drawText, resolveAnchor, type Anchor } from "./text.js";
import { renderBar, type BarOptions } from "./widgets/bar.js";
import { renderSubtitle, renderTitle } from "./widgets/chrome.js";
import { renderCompass, type CompassOptions } from "./widgets/compass.js";
import { renderFace, type FaceOptions } from "./widgets/face.js";
import { renderGauge, type GaugeOptions } from "./widgets/gauge.js";
import { renderGraph, type GraphOptions } from "./widgets/graph.js";
import { renderMenu, type MenuOptions } from "./widgets/menu.js";
import { renderValue, type ValueOptions } from "./widgets/value.js";
import { renderWatch, type WatchOptions } from "./widgets/watch.js";

export type FrameState = "idle" | "cleared" | "drawing";

export type WidgetKind =
  | "title"
  | "subtitle"
  | "value"
  | "bar"
  | "gauge"
  | "graph"
  | "menu"
  | "compass"
  | "watch"
  | "face";

/**
 * Immersive widgets fill the whole disc; content widgets share it
 */
export type WidgetRole = "immersive" | "content";

export interface LayoutWarning {
  widget: WidgetKind;
  /** First content widget drawn earlier in the same frame */
  after: WidgetKind;
  message: string;
}

export interface ScreenOptions {
  /** Defaults to a profile derived from the backend size */
  profile?: GeometryProfile;
  logger?: Pick<Console, "warn">;
}

export interface TextOptions {
  at?: Anchor;
  /** Explicit top-left position, used instead of `at` */
  x?: number;
  y?: number;
  color?: RGB;
  scale?: number;
}

export class Screen {
  readonly profile: GeometryProfile;
  readonly canvas: Canvas;

  private readonly backend: Backend;
  private readonly logger: Pick<Console, "warn">;
  private frameState: FrameState = "idle";
  private firstContent: WidgetKind | null = null;
  private warnings: LayoutWarning[] = [];

  constructor(backend: Backend, options: ScreenOptions = {}) {
    const profile = options.profile ?? createProfile(backend.width, backend.height);
    if (profile.width !== backend.width || profile.height !== backend.height) {
      throw new InvalidRangeError(
        `Profile ${profile.width}x${profile.height} does not match backend ${backend.width}x${backend.height}`
      );
    }
    this.backend = backend;
    this.profile = profile;
    this.canvas = new Canvas(backend, profile);
    this.logger = options.logger ?? console;
  }

  get state(): FrameState {
    return this.frameState;
  }

  /** Composition warnings raised since the last clear() */
  get layoutWarnings(): readonly LayoutWarning[] {
    return this.warnings;
  }

  // --- Frame control ---

  clear(): void {
    this.backend.clearBuffer();
    this.frameState = "cleared";
    this.firstContent = null;
    this.warnings = [];
  }

  present(): void {
    this.backend.present();
    this.frameState = "idle";
  }

  // --- Widgets ---

  title(text: string, color?: RGB): void {
    this.drawWidget("title", "content", () => renderTitle(this.canvas, text, color));
  }

  subtitle(lines: string | readonly string[], color?: RGB): void {
    this.drawWidget("subtitle", "content", () => renderSubtitle(this.canvas, lines, color));
  }

  value(val: number | string, options?: ValueOptions): void {
    this.drawWidget("value", "content", () => renderValue(this.canvas, val, options));
  }

  bar(val: number, maxVal?: number, options?: BarOptions): void {
    this.drawWidget("bar", "content", () => renderBar(this.canvas, val, maxVal, options));
  }

  gauge(val: number, minVal?: number, maxVal?: number, options?: GaugeOptions): void {
    this.drawWidget("gauge", "content", () => renderGauge(this.canvas, val, minVal, maxVal, options));
  }

  graph(data: readonly number[], minVal?: number, maxVal?: number, options?: GraphOptions): void {
    this.drawWidget("graph", "content", () => renderGraph(this.canvas, data, minVal, maxVal, options));
  }

  menu(items: readonly string[], selectedIndex: number, options?: MenuOptions): void {
    this.drawWidget("menu", "content", () => renderMenu(this.canvas, items, selectedIndex, options));
  }

  compass(heading: number, options?: CompassOptions): void {
    this.drawWidget("compass", "immersive", () => renderCompass(this.canvas, heading, options));
  }

  watch(hours: number, minutes: number, seconds: number, options?: WatchOptions): void {
    this.drawWidget("watch", "immersive", () => renderWatch(this.canvas, hours, minutes, seconds, options));
  }

  face(expression: string, options: FaceOptions = {}): void {
    const role = options.compact ? "content" : "immersive";
    this.drawWidget("face", role, () => renderFace(this.canvas, expression, options));
  }

  // --- Primitives ---

  text(text: string, options: TextOptions = {}): void {
    const { at = "CENTER", color = WHITE, scale = 1 } = options;
    this.draw(() => {
      const anchor = resolveAnchor(this.profile, at, text.length, scale);
      drawText(this.canvas, text, options.x ?? anchor.x, options.y ?? anchor.y, color, scale);
    });
  }

  line(x0: number, y0: number, x1: number, y1: number, color: RGB = WHITE): void {
    this.draw(() => this.canvas.line(x0, y0, x1, y1, color));
  }

  circle(x: number, y: number, r: number, color: RGB = WHITE, fill: boolean = false): void {
    this.draw(() => {
      if (fill) {
        this.canvas.fillCircle(x, y, r, color);
      } else {
        this.canvas.circle(x, y, r, color);
      }
    });
  }

  rect(x: number, y: number, w: number, h: number, color: RGB = WHITE, fill: boolean = false): void {
    this.draw(() => {
      if (fill) {
        this.canvas.fillRect(x, y, w, h, color);
      } else {
        this.canvas.rect(x, y, w, h, color);
      }
    });
  }

  pixel(x: number, y: number, color: RGB = WHITE): void {
    this.draw(() => this.canvas.pixel(x, y, color));
  }

  // --- State tracking ---

  /**
   * Run a draw call, then update the frame state. A call that throws leaves
   * the state and layout bookkeeping as they were.
   */
  private draw(render: () => void): void {
    render();
    if (this.frameState === "idle") {
      this.logger.warn("[screen] Drawing without clear(): previous frame content is retained");
    }
    this.frameState = "drawing";
  }

  private drawWidget(widget: WidgetKind, role: WidgetRole, render: () => void): void {
    this.draw(render);
    if (role === "content") {
      if (!this.firstContent) this.firstContent = widget;
      return;
    }
    if (this.firstContent) {
      const warning: LayoutWarning = {
        widget,
        after: this.firstContent,
        message: `Immersive widget "${widget}" drawn after content widget "${this.firstContent}"; expect overlap`,
      };
      this.warnings.push(warning);
      this.logger.warn(`[screen] ${warning.message}`);
    }
  }
}
