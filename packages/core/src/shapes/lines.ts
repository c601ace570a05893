import type { Framebuffer } from "../framebuffer.js";
import { Path } from "../path.js";
import type { Style } from "../style/style.js";
import type { Point } from "../types/geometry.js";

/**
 * Draws a line in world coordinates from `from` to `to`. Lines only use
 * the stroke; a fill is ignored.
 */
export function line(
  fb: Framebuffer,
  from: Point,
  to: Point,
  style: Style,
): void {
  new Path([from, to], false).render(fb, style);
}
