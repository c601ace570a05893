import { describe, expect, it } from "vitest";
import { Color, Framebuffer, roundHalfAwayFromZero } from "../src/index.js";
import { paintedPixels } from "./helpers/pixels.js";

describe("Framebuffer", () => {
  describe("construction", () => {
    it("starts transparent with width * height pixels", () => {
      const fb = new Framebuffer(4, 3);
      expect(fb.width).toBe(4);
      expect(fb.height).toBe(3);
      expect(fb.dimensions).toEqual({ width: 4, height: 3 });
      expect(fb.length).toBe(12);
      expect(fb.asBytes()).toHaveLength(48);
      expect(fb.asBytes().every((b) => b === 0)).toBe(true);
    });

    it("rejects non-positive dimensions", () => {
      expect(() => new Framebuffer(0, 5)).toThrow(RangeError);
      expect(() => new Framebuffer(5, -1)).toThrow(RangeError);
    });

    it("rejects non-integer dimensions", () => {
      expect(() => new Framebuffer(1.5, 2)).toThrow(RangeError);
    });

    it("rejects dimensions whose byte length overflows", () => {
      expect(() => new Framebuffer(2 ** 30, 2 ** 30)).toThrow(
        "Framebuffer dimensions overflow",
      );
    });
  });

  describe("pixel access", () => {
    it("reads back a written pixel", () => {
      const fb = new Framebuffer(4, 4);
      const color = new Color(255, 128, 64, 200);
      fb.setPixel(1, 2, color);
      expect(fb.getPixel(1, 2)?.rgba()).toEqual([255, 128, 64, 200]);
      expect(fb.getPixel(2, 1)?.rgba()).toEqual([0, 0, 0, 0]);
    });

    it("returns undefined out of bounds", () => {
      const fb = new Framebuffer(4, 4);
      expect(fb.getPixel(-1, 0)).toBeUndefined();
      expect(fb.getPixel(0, -1)).toBeUndefined();
      expect(fb.getPixel(4, 0)).toBeUndefined();
      expect(fb.getPixel(0, 4)).toBeUndefined();
      expect(fb.getPixel(1.5, 0)).toBeUndefined();
    });

    it("ignores out-of-bounds writes without wrapping", () => {
      const fb = new Framebuffer(4, 4);
      fb.plot(-1, 1, Color.RED);
      fb.plot(4, 1, Color.RED);
      fb.plot(1, -1, Color.RED);
      fb.setPixel(1, 4, Color.RED);
      fb.setPixel(0.5, 1, Color.RED);
      expect(paintedPixels(fb)).toEqual([]);
    });

    it("replaces pixels without blending", () => {
      const fb = new Framebuffer(2, 2);
      fb.plot(0, 0, Color.RED);
      fb.plot(0, 0, new Color(0, 0, 255, 10));
      expect(fb.getPixel(0, 0)?.rgba()).toEqual([0, 0, 255, 10]);
    });
  });

  describe("fillSpan", () => {
    it("fills the inclusive range in either order", () => {
      const fb = new Framebuffer(5, 3);
      fb.fillSpan(1, 3, 1, Color.RED);
      expect(paintedPixels(fb)).toEqual(["1,1", "2,1", "3,1"]);
    });

    it("clips to the framebuffer width", () => {
      const fb = new Framebuffer(5, 3);
      fb.fillSpan(0, -5, 1, Color.RED);
      fb.fillSpan(2, 3, 100, Color.RED);
      expect(paintedPixels(fb)).toEqual(["0,0", "1,0", "3,2", "4,2"]);
    });

    it("is a no-op for rows or spans off the canvas", () => {
      const fb = new Framebuffer(5, 3);
      fb.fillSpan(-1, 0, 4, Color.RED);
      fb.fillSpan(3, 0, 4, Color.RED);
      fb.fillSpan(0, 5, 10, Color.RED);
      fb.fillSpan(0, -3, -1, Color.RED);
      expect(paintedPixels(fb)).toEqual([]);
    });

    it("fills a single pixel when both ends match", () => {
      const fb = new Framebuffer(5, 3);
      fb.fillSpan(2, 4, 4, Color.GREEN);
      expect(paintedPixels(fb)).toEqual(["4,2"]);
    });
  });

  describe("clear", () => {
    it("overwrites every pixel", () => {
      const fb = new Framebuffer(3, 2);
      fb.clear(Color.BLUE);
      expect(fb.getPixel(2, 1)?.rgba()).toEqual([0, 0, 255, 255]);
      fb.clear(Color.TRANSPARENT);
      expect(fb.asBytes().every((b) => b === 0)).toBe(true);
    });
  });

  describe("asBytes", () => {
    it("packs pixels row-major as RGBA", () => {
      const fb = new Framebuffer(2, 2);
      fb.plot(1, 0, new Color(1, 2, 3, 4));
      fb.plot(0, 1, new Color(5, 6, 7, 8));
      expect(Array.from(fb.asBytes())).toEqual([
        0, 0, 0, 0, 1, 2, 3, 4, 5, 6, 7, 8, 0, 0, 0, 0,
      ]);
    });

    it("returns a copy", () => {
      const fb = new Framebuffer(1, 1);
      const bytes = fb.asBytes();
      bytes[0] = 99;
      expect(fb.getPixel(0, 0)?.r).toBe(0);
    });
  });

  describe("worldToPixel", () => {
    it("maps the world origin to the center pixel of an odd canvas", () => {
      const fb = new Framebuffer(5, 7);
      expect(fb.worldToPixel({ x: 0, y: 0 })).toEqual({ x: 2, y: 3 });
    });

    it("flips Y and offsets by (dimension - 1) / 2", () => {
      const fb = new Framebuffer(20, 15);
      expect(fb.worldToPixel({ x: -1, y: -2 })).toEqual({ x: 9, y: 9 });
      expect(fb.worldToPixel({ x: 1, y: 1 })).toEqual({ x: 11, y: 6 });
    });

    it("rounds halves away from zero", () => {
      const fb = new Framebuffer(4, 4);
      // x: -2 + 1.5 = -0.5, y: 1.5 - 0 = 1.5
      expect(fb.worldToPixel({ x: -2, y: 0 })).toEqual({ x: -1, y: 2 });
    });

    it("never yields negative zero", () => {
      const fb = new Framebuffer(5, 5);
      const px = fb.worldToPixel({ x: -2.4, y: 0 });
      expect(Object.is(px?.x, 0)).toBe(true);
    });

    it("returns null for unrepresentable coordinates", () => {
      const fb = new Framebuffer(5, 5);
      expect(fb.worldToPixel({ x: Number.NaN, y: 0 })).toBeNull();
      expect(fb.worldToPixel({ x: 0, y: Number.POSITIVE_INFINITY })).toBeNull();
      expect(fb.worldToPixel({ x: 1e300, y: 0 })).toBeNull();
    });

    it("is deterministic", () => {
      const fb = new Framebuffer(9, 9);
      const a = fb.worldToPixel({ x: 1.25, y: -3.75 });
      const b = fb.worldToPixel({ x: 1.25, y: -3.75 });
      expect(a).toEqual(b);
      expect(a).toEqual({ x: 5, y: 8 });
    });
  });
});

describe("roundHalfAwayFromZero", () => {
  it("rounds halves outward on both sides", () => {
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
    expect(roundHalfAwayFromZero(-2.4)).toBe(-2);
    expect(roundHalfAwayFromZero(0.49)).toBe(0);
  });
});
