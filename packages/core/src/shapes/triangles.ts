import type { Framebuffer } from "../framebuffer.js";
import { strokePathPx } from "../path.js";
import { fillTrianglePx } from "../raster/triangle.js";
import { effectiveColor, hasPaint, type Style } from "../style/style.js";
import type { Point } from "../types/geometry.js";

const SQRT3 = Math.sqrt(3);

/**
 * Draws a triangle from three world coordinates. The fill goes through the
 * fixed-point triangle rasterizer rather than the generic polygon fill.
 */
export function triangle(
  fb: Framebuffer,
  a: Point,
  b: Point,
  c: Point,
  style: Style,
): void {
  if (!hasPaint(style)) return;

  const pa = fb.worldToPixel(a);
  const pb = fb.worldToPixel(b);
  const pc = fb.worldToPixel(c);
  if (!pa || !pb || !pc) return;

  if (style.fill) {
    fillTrianglePx(fb, pa, pb, pc, effectiveColor(style.fill));
  }

  if (style.stroke) {
    strokePathPx(
      fb,
      [pa, pb, pc],
      true,
      style.stroke.width,
      effectiveColor(style.stroke),
    );
  }
}

/**
 * Draws an equilateral triangle with a horizontal base, centered on
 * `center` (the centroid). For arbitrary triangles use {@link triangle}.
 */
export function equilateralTriangle(
  fb: Framebuffer,
  center: Point,
  side: number,
  style: Style,
): void {
  if (!Number.isFinite(side) || side <= 0) return;

  const apexDy = (SQRT3 / 3) * side;
  const baseDy = (SQRT3 / 6) * side;

  triangle(
    fb,
    { x: center.x, y: center.y + apexDy },
    { x: center.x - side * 0.5, y: center.y - baseDy },
    { x: center.x + side * 0.5, y: center.y - baseDy },
    style,
  );
}
