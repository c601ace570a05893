import { assertByte, Color } from "./color.js";

/** Per-draw opacity multiplier, 0 (invisible) to 255 (unchanged). */
export type Opacity = number;

export const OPAQUE: Opacity = 255;
export const DEFAULT_STROKE_WIDTH = 1.0;

export interface Fill {
  readonly color: Color;
  readonly opacity: Opacity;
}

export interface Stroke {
  readonly color: Color;
  readonly opacity: Opacity;
  /** Width in device pixels */
  readonly width: number;
}

/**
 * Visual options for a shape. A style with neither fill nor stroke
 * draws nothing.
 */
export interface Style {
  readonly fill?: Fill;
  readonly stroke?: Stroke;
}

export function fill(color: Color, opacity: Opacity = OPAQUE): Fill {
  assertByte(opacity, "Opacity");
  return { color, opacity };
}

export function stroke(
  color: Color,
  width: number = DEFAULT_STROKE_WIDTH,
  opacity: Opacity = OPAQUE,
): Stroke {
  assertByte(opacity, "Opacity");
  return { color, opacity, width };
}

/** Style for a fill-only shape. */
export function fillStyle(color: Color, opacity?: Opacity): Style {
  return { fill: fill(color, opacity) };
}

/** Style for a stroke-only shape. */
export function strokeStyle(
  color: Color,
  width?: number,
  opacity?: Opacity,
): Style {
  return { stroke: stroke(color, width, opacity) };
}

export function hasPaint(style: Style): boolean {
  return style.fill !== undefined || style.stroke !== undefined;
}

/**
 * The color actually written for a fill or stroke: RGB unchanged, alpha
 * scaled by the opacity and rounded to the nearest byte.
 */
export function effectiveColor(paint: Fill | Stroke): Color {
  const { color, opacity } = paint;
  if (opacity === OPAQUE) return color;
  const alpha = Math.round((color.a * opacity) / 255);
  return color.withAlpha(alpha);
}
