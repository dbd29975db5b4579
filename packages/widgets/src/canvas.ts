/**
 * Drawing canvas
 *
 * Pairs a backend with its geometry profile and converts RGB to the
 * backend's native color once per call. Shapes the backend capability set
 * does not have (circles, arcs, triangles) are rasterized here from
 * setPixel and horizontal lines.
 */

import {
  toNative,
  type Backend,
  type ColorDepth,
  type GeometryProfile,
  type NativeColor,
  type RGB,
} from "@roundscreen/core";

export class Canvas {
  readonly depth: ColorDepth;

  constructor(
    readonly backend: Backend,
    readonly profile: GeometryProfile
  ) {
    this.depth = backend.colorDepth();
  }

  native(color: RGB): NativeColor {
    return toNative(color, this.depth);
  }

  pixel(x: number, y: number, color: RGB): void {
    this.backend.setPixel(x, y, this.native(color));
  }

  line(x0: number, y0: number, x1: number, y1: number, color: RGB): void {
    this.backend.drawLine(x0, y0, x1, y1, this.native(color));
  }

  hline(x: number, y: number, w: number, color: RGB): void {
    this.backend.drawHLine(x, y, w, this.native(color));
  }

  vline(x: number, y: number, h: number, color: RGB): void {
    this.backend.drawVLine(x, y, h, this.native(color));
  }

  fillRect(x: number, y: number, w: number, h: number, color: RGB): void {
    this.backend.fillRect(x, y, w, h, this.native(color));
  }

  rect(x: number, y: number, w: number, h: number, color: RGB): void {
    this.backend.drawRect(x, y, w, h, this.native(color));
  }

  /**
   * Midpoint circle outline
   */
  circle(cx: number, cy: number, r: number, color: RGB): void {
    const c = this.native(color);
    let x = r;
    let y = 0;
    let d = 1 - r;
    while (x >= y) {
      const octants: Array<[number, number]> = [
        [x, y], [y, x], [-x, y], [-y, x],
        [x, -y], [y, -x], [-x, -y], [-y, -x],
      ];
      for (const [ox, oy] of octants) {
        this.backend.setPixel(cx + ox, cy + oy, c);
      }
      y++;
      if (d < 0) {
        d += 2 * y + 1;
      } else {
        x--;
        d += 2 * (y - x) + 1;
      }
    }
  }

  fillCircle(cx: number, cy: number, r: number, color: RGB): void {
    const c = this.native(color);
    for (let dy = -r; dy <= r; dy++) {
      const dx = Math.floor(Math.sqrt(r * r - dy * dy));
      this.backend.drawHLine(cx - dx, cy + dy, 2 * dx + 1, c);
    }
  }

  /**
   * Scanline triangle fill
   */
  fillTriangle(
    x0: number, y0: number,
    x1: number, y1: number,
    x2: number, y2: number,
    color: RGB
  ): void {
    const c = this.native(color);
    const [a, b, d] = [
      { x: x0, y: y0 },
      { x: x1, y: y1 },
      { x: x2, y: y2 },
    ].sort((p, q) => p.y - q.y);

    const edgeX = (ya: number, xa: number, yb: number, xb: number, y: number): number =>
      yb === ya ? xa : xa + Math.trunc(((xb - xa) * (y - ya)) / (yb - ya));

    for (let y = a.y; y <= d.y; y++) {
      let xl = edgeX(a.y, a.x, d.y, d.x, y);
      let xr = y < b.y ? edgeX(a.y, a.x, b.y, b.x, y) : edgeX(b.y, b.x, d.y, d.x, y);
      if (xl > xr) [xl, xr] = [xr, xl];
      this.backend.drawHLine(xl, y, xr - xl + 1, c);
    }
  }

  /**
   * Thick arc as a ring sector. Angles are in degrees, 0 pointing right and
   * increasing clockwise (screen y grows downward). Pixels whose center
   * lies within thickness/2 of `radius` and whose angle lies in
   * [startDeg, startDeg + sweepDeg] are set. Pixel centers sit at +0.5 from
   * the grid point (cx, cy), as in isInsideDisc, so a ring around the
   * profile center whose outer edge is within the radius stays on the disc.
   */
  arc(
    cx: number,
    cy: number,
    radius: number,
    thickness: number,
    startDeg: number,
    sweepDeg: number,
    color: RGB
  ): void {
    if (sweepDeg <= 0) return;
    const c = this.native(color);
    const inner = radius - thickness / 2;
    const outer = radius + thickness / 2;
    const reach = Math.ceil(outer);

    for (let dy = -reach; dy <= reach; dy++) {
      for (let dx = -reach; dx <= reach; dx++) {
        const px = dx + 0.5;
        const py = dy + 0.5;
        const dist = Math.sqrt(px * px + py * py);
        if (dist < inner || dist > outer) continue;
        const angle = ((Math.atan2(py, px) * 180) / Math.PI + 360) % 360;
        const rel = (angle - startDeg + 720) % 360;
        if (rel <= sweepDeg) {
          this.backend.setPixel(cx + dx, cy + dy, c);
        }
      }
    }
  }

  /**
   * Blit a one-color mask, each mask cell drawn as a `cell` x `cell` block
   */
  blitMask(
    mask: ReadonlyArray<ReadonlyArray<boolean>>,
    x: number,
    y: number,
    cell: number,
    color: RGB
  ): void {
    const rows = mask.length;
    const cols = rows > 0 ? mask[0].length : 0;
    const width = cols * cell;
    const height = rows * cell;
    const bits = new Uint8Array(width * height);
    for (let py = 0; py < height; py++) {
      for (let px = 0; px < width; px++) {
        if (mask[Math.floor(py / cell)][Math.floor(px / cell)]) {
          bits[py * width + px] = 1;
        }
      }
    }
    this.backend.blit({ width, height, color: this.native(color), bits }, x, y);
  }
}
