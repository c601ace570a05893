import type { Framebuffer } from "../framebuffer.js";
import { Path } from "../path.js";
import type { Style } from "../style/style.js";
import type { Point } from "../types/geometry.js";

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/** Pixels a stroke can reach beyond the outline it follows. */
function strokeReach(style: Style): number {
  const width = style.stroke?.width;
  return width !== undefined && isPositive(width) ? Math.ceil(width / 2) : 0;
}

/**
 * Draws an axis-aligned rectangle centered on `center`. A rectangle whose
 * box, grown by the stroke, misses the canvas draws nothing. Otherwise
 * edges are clamped to a band just outside the canvas, wide enough that a
 * clamped edge and its stroke stay off-screen.
 */
export function rectangle(
  fb: Framebuffer,
  center: Point,
  width: number,
  height: number,
  style: Style,
): void {
  if (!isPositive(width) || !isPositive(height)) return;

  const reach = strokeReach(style);
  const halfW = width / 2;
  const halfH = height / 2;
  const canvasX = fb.width / 2;
  const canvasY = fb.height / 2;

  if (
    center.x + halfW + reach < -canvasX ||
    center.x - halfW - reach >= canvasX ||
    center.y + halfH + reach < -canvasY ||
    center.y - halfH - reach >= canvasY
  ) {
    return;
  }

  const maxX = canvasX + reach + 1;
  const maxY = canvasY + reach + 1;

  const left = Math.max(center.x - halfW, -maxX);
  const right = Math.min(center.x + halfW, maxX);
  const top = Math.min(center.y + halfH, maxY);
  const bottom = Math.max(center.y - halfH, -maxY);

  const path = new Path(
    [
      { x: left, y: top },
      { x: right, y: top },
      { x: right, y: bottom },
      { x: left, y: bottom },
    ],
    true,
  );
  path.render(fb, style);
}

/** Draws a square of `side` centered on `center`. */
export function square(
  fb: Framebuffer,
  center: Point,
  side: number,
  style: Style,
): void {
  rectangle(fb, center, side, side, style);
}
