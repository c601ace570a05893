import type { Framebuffer } from "../framebuffer.js";
import type { Color } from "../style/color.js";
import type { PixelPoint } from "../types/geometry.js";

// Cohen-Sutherland outcodes
const LEFT = 1;
const RIGHT = 2;
const TOP = 4;
const BOTTOM = 8;

export interface ClipRect {
  xmin: number;
  ymin: number;
  xmax: number;
  ymax: number;
}

function outCode(x: number, y: number, r: ClipRect): number {
  let code = 0;
  if (x < r.xmin) code |= LEFT;
  else if (x > r.xmax) code |= RIGHT;
  if (y < r.ymin) code |= TOP;
  else if (y > r.ymax) code |= BOTTOM;
  return code;
}

/**
 * `a0 + da * (bTarget - b0) / db`, truncated toward zero. BigInt keeps the
 * product exact for endpoints far outside the framebuffer.
 */
function intersect(
  a0: number,
  a1: number,
  b0: number,
  b1: number,
  bTarget: number,
): number {
  const da = BigInt(a1) - BigInt(a0);
  const db = BigInt(b1) - BigInt(b0);
  return Number(BigInt(a0) + (da * (BigInt(bTarget) - BigInt(b0))) / db);
}

/**
 * Clips the segment `p0`-`p1` to `rect` (inclusive bounds). Returns `null`
 * when the segment lies fully outside.
 */
export function clipLine(
  rect: ClipRect,
  p0: PixelPoint,
  p1: PixelPoint,
): [PixelPoint, PixelPoint] | null {
  let { x: x0, y: y0 } = p0;
  let { x: x1, y: y1 } = p1;

  let c0 = outCode(x0, y0, rect);
  let c1 = outCode(x1, y1, rect);

  for (;;) {
    if ((c0 | c1) === 0) {
      return [
        { x: x0, y: y0 },
        { x: x1, y: y1 },
      ];
    }
    if ((c0 & c1) !== 0) return null;

    const cOut = c0 !== 0 ? c0 : c1;
    let xi: number;
    let yi: number;

    if (cOut & BOTTOM) {
      if (y1 === y0) return null;
      yi = rect.ymax;
      xi = intersect(x0, x1, y0, y1, yi);
    } else if (cOut & TOP) {
      if (y1 === y0) return null;
      yi = rect.ymin;
      xi = intersect(x0, x1, y0, y1, yi);
    } else if (cOut & RIGHT) {
      if (x1 === x0) return null;
      xi = rect.xmax;
      yi = intersect(y0, y1, x0, x1, xi);
    } else {
      if (x1 === x0) return null;
      xi = rect.xmin;
      yi = intersect(y0, y1, x0, x1, xi);
    }

    if (cOut === c0) {
      x0 = xi;
      y0 = yi;
      c0 = outCode(x0, y0, rect);
    } else {
      x1 = xi;
      y1 = yi;
      c1 = outCode(x1, y1, rect);
    }
  }
}

/**
 * Draws a one-pixel line in pixel coordinates with integer Bresenham
 * stepping, after clipping to the framebuffer. A zero-length segment
 * plots a single pixel.
 */
export function drawLinePx(
  fb: Framebuffer,
  from: PixelPoint,
  to: PixelPoint,
  color: Color,
): void {
  const clipped = clipLine(
    { xmin: 0, ymin: 0, xmax: fb.width - 1, ymax: fb.height - 1 },
    from,
    to,
  );
  if (!clipped) return;

  const [start, end] = clipped;
  let x = start.x;
  let y = start.y;

  const dx = Math.abs(end.x - start.x);
  const dy = Math.abs(end.y - start.y);
  const sx = Math.sign(end.x - start.x);
  const sy = Math.sign(end.y - start.y);

  if (dx >= dy) {
    let err = 2 * dy - dx;
    for (let i = 0; i <= dx; i++) {
      fb.plot(x, y, color);
      if (err >= 0) {
        y += sy;
        err -= 2 * dx;
      }
      x += sx;
      err += 2 * dy;
    }
  } else {
    let err = 2 * dx - dy;
    for (let i = 0; i <= dy; i++) {
      fb.plot(x, y, color);
      if (err >= 0) {
        x += sx;
        err -= 2 * dy;
      }
      y += sy;
      err += 2 * dx;
    }
  }
}
