import { Color, NAMED_COLORS } from "../style/color.js";
import type { ColorConfig } from "../types/config.js";

function isColorName(value: string): value is keyof typeof NAMED_COLORS {
  return Object.prototype.hasOwnProperty.call(NAMED_COLORS, value);
}

/**
 * Resolve a color from config: a name (`red`), a hex string (`#ff000080`)
 * or an `[r, g, b, a]` tuple.
 */
export function parseColor(value: ColorConfig): Color {
  if (Array.isArray(value)) {
    return Color.fromRgba(value);
  }

  const name = value.trim().toLowerCase();
  if (isColorName(name)) {
    return NAMED_COLORS[name];
  }

  return Color.fromHex(name);
}
