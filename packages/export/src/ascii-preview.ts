import {
  type Color,
  effectiveColor,
  type Framebuffer,
  type ResolvedFrame,
  type Style,
} from "@pixelstage/core";

export interface LegendEntry {
  char: string;
  color: Color;
}

/** Character for a pixel with zero alpha */
export const EMPTY_CHAR = "·";
/** Character for a visible pixel matching no legend entry */
export const OTHER_CHAR = "#";

/**
 * Legend for a shape's style: `S` marks the effective stroke color and
 * `F` the effective fill color. The stroke wins when both resolve to the
 * same color.
 */
export function legendFor(style: Style): LegendEntry[] {
  const legend: LegendEntry[] = [];
  if (style.stroke) legend.push({ char: "S", color: effectiveColor(style.stroke) });
  if (style.fill) legend.push({ char: "F", color: effectiveColor(style.fill) });
  return legend;
}

/**
 * One character per pixel, one line per row. Transparent pixels print as
 * `·`, legend colors as their character, anything else as `#`.
 */
export function renderAscii(
  fb: Framebuffer,
  legend: readonly LegendEntry[] = [],
): string {
  const data = fb.pixels();
  const lines: string[] = [];

  for (let y = 0; y < fb.height; y++) {
    let row = "";
    for (let x = 0; x < fb.width; x++) {
      const idx = (y * fb.width + x) * 4;
      const a = data[idx + 3];
      if (a === 0) {
        row += EMPTY_CHAR;
        continue;
      }
      const entry = legend.find(
        ({ color }) =>
          color.r === data[idx] &&
          color.g === data[idx + 1] &&
          color.b === data[idx + 2] &&
          color.a === a,
      );
      row += entry ? entry.char : OTHER_CHAR;
    }
    lines.push(row);
  }

  return lines.join("\n");
}

/**
 * Legend covering every command in a frame, in drawing order. An earlier
 * entry wins over a later one with the same color.
 */
export function legendForFrame(frame: ResolvedFrame): LegendEntry[] {
  return frame.commands.flatMap((cmd) => legendFor(cmd.style));
}
