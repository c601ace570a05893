import { describe, expect, it } from "vitest";
import {
  Color,
  Framebuffer,
  clipLine,
  drawLinePx,
  line,
  strokeStyle,
} from "../src/index.js";
import { paintedPixels } from "./helpers/pixels.js";

const RECT = { xmin: 0, ymin: 0, xmax: 9, ymax: 9 };

describe("clipLine", () => {
  it("keeps a segment that is fully inside", () => {
    expect(clipLine(RECT, { x: 1, y: 2 }, { x: 8, y: 3 })).toEqual([
      { x: 1, y: 2 },
      { x: 8, y: 3 },
    ]);
  });

  it("clips both ends of a crossing segment", () => {
    expect(clipLine(RECT, { x: -5, y: 5 }, { x: 15, y: 5 })).toEqual([
      { x: 0, y: 5 },
      { x: 9, y: 5 },
    ]);
  });

  it("rejects a segment fully outside", () => {
    expect(clipLine(RECT, { x: -5, y: -5 }, { x: -1, y: -10 })).toBeNull();
    expect(clipLine(RECT, { x: 10, y: 0 }, { x: 20, y: 9 })).toBeNull();
  });

  it("stays exact for endpoints far off-canvas", () => {
    expect(
      clipLine(RECT, { x: -1e15, y: -1e15 }, { x: 1e15, y: 1e15 }),
    ).toEqual([
      { x: 0, y: 0 },
      { x: 9, y: 9 },
    ]);
  });
});

describe("drawLinePx", () => {
  it("plots a single pixel for a zero-length segment", () => {
    const fb = new Framebuffer(5, 5);
    drawLinePx(fb, { x: 2, y: 3 }, { x: 2, y: 3 }, Color.WHITE);
    expect(paintedPixels(fb)).toEqual(["2,3"]);
  });

  it("draws horizontal and vertical runs", () => {
    const fb = new Framebuffer(4, 4);
    drawLinePx(fb, { x: 3, y: 1 }, { x: 0, y: 1 }, Color.WHITE);
    expect(paintedPixels(fb)).toEqual(["0,1", "1,1", "2,1", "3,1"]);

    fb.clear(Color.TRANSPARENT);
    drawLinePx(fb, { x: 2, y: 0 }, { x: 2, y: 3 }, Color.WHITE);
    expect(paintedPixels(fb)).toEqual(["2,0", "2,1", "2,2", "2,3"]);
  });

  it("plots one pixel per step along the driving axis", () => {
    const fb = new Framebuffer(10, 10);
    drawLinePx(fb, { x: 0, y: 0 }, { x: 6, y: 2 }, Color.WHITE);
    expect(paintedPixels(fb)).toHaveLength(7);
  });

  it("draws only the visible part of a long off-canvas line", () => {
    const fb = new Framebuffer(10, 10);
    drawLinePx(fb, { x: -1e12, y: 5 }, { x: 1e12, y: 5 }, Color.WHITE);
    expect(paintedPixels(fb)).toEqual(
      Array.from({ length: 10 }, (_, x) => `${x},5`),
    );
  });

  it("draws nothing for a line fully off-canvas", () => {
    const fb = new Framebuffer(10, 10);
    drawLinePx(fb, { x: -3, y: -1 }, { x: -1, y: 8 }, Color.WHITE);
    expect(paintedPixels(fb)).toEqual([]);
  });
});

describe("line", () => {
  it("draws a connected diagonal near the center", () => {
    const fb = new Framebuffer(20, 15);
    line(fb, { x: -1, y: -2 }, { x: 1, y: 1 }, strokeStyle(Color.WHITE));

    expect(paintedPixels(fb)).toEqual(["11,6", "10,7", "10,8", "9,9"]);
    expect(fb.getPixel(10, 7)?.equals(Color.WHITE)).toBe(true);
  });

  it("ignores a fill", () => {
    const fb = new Framebuffer(20, 15);
    line(fb, { x: -1, y: -2 }, { x: 1, y: 1 }, {
      fill: { color: Color.RED, opacity: 255 },
    });
    expect(paintedPixels(fb)).toEqual([]);
  });

  it("skips an unrepresentable endpoint", () => {
    const fb = new Framebuffer(20, 15);
    line(fb, { x: 0, y: 0 }, { x: Number.NaN, y: 1 }, strokeStyle(Color.WHITE));
    expect(paintedPixels(fb)).toEqual([]);
  });
});
