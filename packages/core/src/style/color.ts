/** RGBA byte tuple */
export type Rgba = readonly [number, number, number, number];

const HEX_3 = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/i;
const HEX_6 = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;
const HEX_8 = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

/**
 * Throws if `value` is not an integer in 0-255.
 */
export function assertByte(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new RangeError(`${name} must be an integer in 0-255, got ${value}`);
  }
}

/**
 * Immutable RGBA color. The alpha channel is the color's intrinsic alpha,
 * separate from the per-draw opacity carried by a fill or stroke.
 */
export class Color {
  static readonly TRANSPARENT = new Color(0, 0, 0, 0);
  static readonly BLACK = new Color(0, 0, 0, 255);
  static readonly WHITE = new Color(255, 255, 255, 255);
  static readonly RED = new Color(255, 0, 0, 255);
  static readonly GREEN = new Color(0, 255, 0, 255);
  static readonly BLUE = new Color(0, 0, 255, 255);

  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;

  constructor(r: number, g: number, b: number, a: number = 255) {
    assertByte(r, "Red channel");
    assertByte(g, "Green channel");
    assertByte(b, "Blue channel");
    assertByte(a, "Alpha channel");
    this.r = r;
    this.g = g;
    this.b = b;
    this.a = a;
    Object.freeze(this);
  }

  static fromRgba([r, g, b, a]: Rgba): Color {
    return new Color(r, g, b, a);
  }

  /**
   * Parse `#rgb`, `#rrggbb` or `#rrggbbaa`.
   * Three- and six-digit forms are opaque.
   */
  static fromHex(input: string): Color {
    const hex = input.trim();
    let match = hex.match(HEX_8);
    if (match) {
      return new Color(
        parseInt(match[1], 16),
        parseInt(match[2], 16),
        parseInt(match[3], 16),
        parseInt(match[4], 16),
      );
    }

    match = hex.match(HEX_6);
    if (match) {
      return new Color(
        parseInt(match[1], 16),
        parseInt(match[2], 16),
        parseInt(match[3], 16),
      );
    }

    match = hex.match(HEX_3);
    if (match) {
      // "#f80" -> "#ff8800"
      return new Color(
        parseInt(match[1] + match[1], 16),
        parseInt(match[2] + match[2], 16),
        parseInt(match[3] + match[3], 16),
      );
    }

    throw new Error(`Invalid hex color: "${input}"`);
  }

  rgba(): Rgba {
    return [this.r, this.g, this.b, this.a];
  }

  withAlpha(alpha: number): Color {
    return new Color(this.r, this.g, this.b, alpha);
  }

  equals(other: Color): boolean {
    return (
      this.r === other.r &&
      this.g === other.g &&
      this.b === other.b &&
      this.a === other.a
    );
  }

  toHex(): string {
    return (
      "#" +
      [this.r, this.g, this.b, this.a]
        .map((c) => c.toString(16).padStart(2, "0"))
        .join("")
    );
  }
}

export const NAMED_COLORS = {
  transparent: Color.TRANSPARENT,
  black: Color.BLACK,
  white: Color.WHITE,
  red: Color.RED,
  green: Color.GREEN,
  blue: Color.BLUE,
} as const;

export type ColorName = keyof typeof NAMED_COLORS;
