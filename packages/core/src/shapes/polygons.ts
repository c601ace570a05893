import type { Framebuffer } from "../framebuffer.js";
import { Path } from "../path.js";
import type { Style } from "../style/style.js";
import type { Point } from "../types/geometry.js";

/**
 * Draws a polygon (or, with `closed` false, a polyline) through `points`.
 * Fill uses the even-odd rule and assumes a simple polygon.
 */
export function polygon(
  fb: Framebuffer,
  points: readonly Point[],
  style: Style,
  closed: boolean = true,
): void {
  new Path(points, closed).render(fb, style);
}
