import type { Framebuffer } from "../framebuffer.js";
import { effectiveColor, hasPaint, type Style } from "../style/style.js";
import type { PixelPoint } from "../types/geometry.js";

export interface CircleRadii {
  /** Outer edge of the stroke, or the nominal radius without one */
  outer: number;
  /** Inner edge of the stroke; 0 without one */
  inner: number;
  /** Radius of the fill disk; 0 without a fill */
  fill: number;
}

/** Whether a stroke width is usable: finite and positive. */
export function isDrawableWidth(width: number): boolean {
  return Number.isFinite(width) && width > 0;
}

/**
 * Derives the stroke annulus and fill disk from the nominal radius. When
 * both are painted the fill stops where the stroke begins.
 */
export function circleRadii(radius: number, style: Style): CircleRadii {
  const strokeWidth =
    style.stroke && isDrawableWidth(style.stroke.width)
      ? style.stroke.width
      : undefined;

  let outer = radius;
  let inner = 0;
  if (strokeWidth !== undefined) {
    outer = radius + Math.ceil(strokeWidth * 0.5);
    inner = Math.max(0, radius - Math.floor(strokeWidth * 0.5));
  }

  let fill = 0;
  if (style.fill) {
    fill = strokeWidth !== undefined ? inner : radius;
  }

  return { outer, inner, fill };
}

/**
 * Horizontal half-extent of a circle, shrunk row by row. `x2` tracks `x * x`
 * so no square root is needed.
 */
class Extent {
  x: number;
  x2: number;

  constructor(readonly radius: number) {
    this.x = radius;
    this.x2 = radius * radius;
  }

  get limit2(): number {
    return this.radius * this.radius;
  }

  shrink(y2: number): void {
    while (this.x > 0 && this.x2 + y2 > this.limit2) {
      this.x2 -= 2 * this.x - 1;
      this.x -= 1;
    }
  }

  /** Half-extent on the row at `y2`, or -1 when the row misses the circle. */
  row(y2: number): number {
    if (this.radius === 0) return -1;
    this.shrink(y2);
    return this.x2 + y2 <= this.limit2 ? this.x : -1;
  }
}

/**
 * Draws a circle in pixel coordinates with integer nominal `radius`: a
 * fill disk and/or a stroke annulus, one pair of mirrored rows at a time.
 */
export function drawCirclePx(
  fb: Framebuffer,
  center: PixelPoint,
  radius: number,
  style: Style,
): void {
  if (!hasPaint(style)) return;
  if (!Number.isInteger(radius) || radius <= 0) return;

  const fillColor = style.fill ? effectiveColor(style.fill) : undefined;
  const strokeColor =
    style.stroke && isDrawableWidth(style.stroke.width)
      ? effectiveColor(style.stroke)
      : undefined;
  if (!fillColor && !strokeColor) return;

  const radii = circleRadii(radius, style);
  const { x: xc, y: yc } = center;

  // bounding box fully off-canvas
  if (
    xc + radii.outer < 0 ||
    xc - radii.outer >= fb.width ||
    yc + radii.outer < 0 ||
    yc - radii.outer >= fb.height
  ) {
    return;
  }

  const outer = new Extent(radii.outer);
  const inner = new Extent(radii.inner);
  const disk = new Extent(radii.fill);

  let y2 = 0;
  for (let y = 0; y <= radii.outer; y++) {
    outer.shrink(y2);
    const xOut = outer.x;
    const xIn = strokeColor ? inner.row(y2) : -1;
    const xFill = fillColor ? disk.row(y2) : -1;

    const rows = y === 0 ? [yc] : [yc - y, yc + y];

    if (fillColor && xFill >= 0) {
      for (const row of rows) {
        fb.fillSpan(row, xc - xFill, xc + xFill, fillColor);
      }
    }

    if (strokeColor) {
      const a = xIn + 1;
      if (a <= xOut) {
        for (const row of rows) {
          if (a <= 0) {
            fb.fillSpan(row, xc - xOut, xc + xOut, strokeColor);
          } else {
            fb.fillSpan(row, xc - xOut, xc - a, strokeColor);
            fb.fillSpan(row, xc + a, xc + xOut, strokeColor);
          }
        }
      }
    }

    y2 += 2 * y + 1;
  }
}
