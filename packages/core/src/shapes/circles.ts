import type { Framebuffer } from "../framebuffer.js";
import { drawCirclePx } from "../raster/circle.js";
import type { Style } from "../style/style.js";
import type { Point } from "../types/geometry.js";

/**
 * Draws a circle centered at world coordinate `center`. The radius is
 * rounded up to whole pixels, minimum one.
 */
export function circle(
  fb: Framebuffer,
  center: Point,
  radius: number,
  style: Style,
): void {
  if (!Number.isFinite(radius) || radius <= 0) return;

  const centerPx = fb.worldToPixel(center);
  if (!centerPx) return;

  drawCirclePx(fb, centerPx, Math.max(1, Math.ceil(radius)), style);
}
