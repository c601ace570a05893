import { Color } from "./style/color.js";
import type { Dimensions, PixelPoint, Point } from "./types/geometry.js";

export const BYTES_PER_PIXEL = 4;

/**
 * Round to the nearest integer, halves away from zero.
 */
export function roundHalfAwayFromZero(value: number): number {
  return value < 0 ? -Math.round(-value) : Math.round(value);
}

/**
 * Row-major RGBA8 pixel grid of fixed size. Every write replaces the
 * pixel outright; there is no blending against existing content.
 */
export class Framebuffer {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;

  /**
   * Creates a `width` x `height` framebuffer, every pixel transparent black.
   * Throws a RangeError for non-positive, non-integer or oversized
   * dimensions.
   */
  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height)) {
      throw new RangeError(
        `Framebuffer dimensions must be integers, got ${width}x${height}`,
      );
    }
    if (width <= 0 || height <= 0) {
      throw new RangeError(
        `Framebuffer must be strictly positive in size, got ${width}x${height}`,
      );
    }
    const byteLength = width * height * BYTES_PER_PIXEL;
    if (!Number.isSafeInteger(byteLength)) {
      throw new RangeError(`Framebuffer dimensions overflow: ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.data = new Uint8Array(byteLength);
  }

  get dimensions(): Dimensions {
    return { width: this.width, height: this.height };
  }

  /** Number of pixels */
  get length(): number {
    return this.width * this.height;
  }

  /** Live view of the pixel bytes. Writes through it mutate the framebuffer. */
  pixels(): Uint8Array {
    return this.data;
  }

  /**
   * Packed row-major RGBA bytes, `width * height * 4` long, for an external
   * encoder. Returns a copy.
   */
  asBytes(): Uint8Array {
    return this.data.slice();
  }

  private inBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.width &&
      y >= 0 &&
      y < this.height
    );
  }

  /** Pixel color at `(x, y)`, or `undefined` when out of bounds. */
  getPixel(x: number, y: number): Color | undefined {
    if (!this.inBounds(x, y)) return undefined;
    const idx = (y * this.width + x) * BYTES_PER_PIXEL;
    const d = this.data;
    return new Color(d[idx], d[idx + 1], d[idx + 2], d[idx + 3]);
  }

  /**
   * Sets the pixel at `(x, y)`. Out-of-bounds and non-integer coordinates
   * are ignored.
   */
  setPixel(x: number, y: number, color: Color): void {
    if (!this.inBounds(x, y)) return;
    this.plot(x, y, color);
  }

  /**
   * Hot path for the rasterizers. Negative coordinates are out of bounds.
   */
  plot(x: number, y: number, color: Color): void {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return;
    const idx = (y * this.width + x) * BYTES_PER_PIXEL;
    this.data[idx] = color.r;
    this.data[idx + 1] = color.g;
    this.data[idx + 2] = color.b;
    this.data[idx + 3] = color.a;
  }

  /**
   * Fills the inclusive run between `x0` and `x1` (either order) on row `y`,
   * clipped to the framebuffer width.
   */
  fillSpan(y: number, x0: number, x1: number, color: Color): void {
    if (y < 0 || y >= this.height) return;

    let a = Math.min(x0, x1);
    let b = Math.max(x0, x1);
    if (b < 0 || a >= this.width) return;
    a = Math.max(a, 0);
    b = Math.min(b, this.width - 1);
    if (a > b) return;

    const row = y * this.width;
    const start = (row + a) * BYTES_PER_PIXEL;
    const end = (row + b + 1) * BYTES_PER_PIXEL;
    writeRun(this.data, start, end, color);
  }

  /** Overwrites every pixel with `color`. */
  clear(color: Color): void {
    writeRun(this.data, 0, this.data.length, color);
  }

  /**
   * Converts a world coordinate (origin at center, Y-up) to a pixel
   * coordinate (origin top-left, Y-down). Returns `null` for non-finite
   * input or a result outside the safe integer range.
   */
  worldToPixel({ x, y }: Point): PixelPoint | null {
    if (!Number.isFinite(x) || !Number.isFinite(y)) return null;

    const centerX = (this.width - 1) * 0.5;
    const centerY = (this.height - 1) * 0.5;

    const px = roundHalfAwayFromZero(x + centerX);
    const py = roundHalfAwayFromZero(centerY - y);

    if (!Number.isSafeInteger(px) || !Number.isSafeInteger(py)) return null;
    // Math.round(-0.4) is -0
    return { x: px + 0, y: py + 0 };
  }
}

function writeRun(
  data: Uint8Array,
  start: number,
  end: number,
  color: Color,
): void {
  const { r, g, b, a } = color;
  for (let i = start; i < end; i += BYTES_PER_PIXEL) {
    data[i] = r;
    data[i + 1] = g;
    data[i + 2] = b;
    data[i + 3] = a;
  }
}
