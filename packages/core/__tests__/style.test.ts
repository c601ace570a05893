import { describe, expect, it } from "vitest";
import {
  Color,
  effectiveColor,
  fill,
  fillStyle,
  hasPaint,
  stroke,
  strokeStyle,
} from "../src/index.js";

describe("Color", () => {
  it("provides named constants", () => {
    expect(Color.TRANSPARENT.rgba()).toEqual([0, 0, 0, 0]);
    expect(Color.BLACK.rgba()).toEqual([0, 0, 0, 255]);
    expect(Color.WHITE.rgba()).toEqual([255, 255, 255, 255]);
    expect(Color.RED.rgba()).toEqual([255, 0, 0, 255]);
    expect(Color.GREEN.rgba()).toEqual([0, 255, 0, 255]);
    expect(Color.BLUE.rgba()).toEqual([0, 0, 255, 255]);
  });

  it("is immutable", () => {
    expect(Object.isFrozen(Color.RED)).toBe(true);
  });

  it("defaults alpha to opaque", () => {
    expect(new Color(1, 2, 3).a).toBe(255);
  });

  it("rejects channels outside a byte", () => {
    expect(() => new Color(256, 0, 0)).toThrow(RangeError);
    expect(() => new Color(0, -1, 0)).toThrow(RangeError);
    expect(() => new Color(0, 0, 0.5)).toThrow(RangeError);
  });

  it("parses hex strings", () => {
    expect(Color.fromHex("#f80").rgba()).toEqual([255, 136, 0, 255]);
    expect(Color.fromHex("#102030").rgba()).toEqual([16, 32, 48, 255]);
    expect(Color.fromHex("#11223344").rgba()).toEqual([17, 34, 51, 68]);
    expect(() => Color.fromHex("#12")).toThrow('Invalid hex color: "#12"');
  });

  it("formats as hex", () => {
    expect(new Color(255, 0, 16, 128).toHex()).toBe("#ff001080");
  });

  it("compares by value", () => {
    expect(new Color(255, 0, 0).equals(Color.RED)).toBe(true);
    expect(Color.RED.withAlpha(10).equals(Color.RED)).toBe(false);
  });
});

describe("Style", () => {
  it("defaults opacity to opaque and stroke width to one pixel", () => {
    expect(fill(Color.RED).opacity).toBe(255);
    expect(stroke(Color.RED).width).toBe(1);
    expect(stroke(Color.RED).opacity).toBe(255);
  });

  it("rejects opacity outside a byte", () => {
    expect(() => fill(Color.RED, 300)).toThrow(RangeError);
    expect(() => stroke(Color.RED, 1, -1)).toThrow(RangeError);
  });

  it("reports whether anything is painted", () => {
    expect(hasPaint({})).toBe(false);
    expect(hasPaint(fillStyle(Color.RED))).toBe(true);
    expect(hasPaint(strokeStyle(Color.RED))).toBe(true);
  });

  it("builds single-paint styles", () => {
    expect(fillStyle(Color.RED).stroke).toBeUndefined();
    expect(strokeStyle(Color.WHITE, 3).stroke?.width).toBe(3);
    expect(strokeStyle(Color.WHITE).fill).toBeUndefined();
  });
});

describe("effectiveColor", () => {
  it("returns the color unchanged at full opacity", () => {
    expect(effectiveColor(fill(Color.RED))).toBe(Color.RED);
  });

  it("scales the intrinsic alpha by the opacity", () => {
    expect(effectiveColor(fill(Color.RED, 128)).rgba()).toEqual([255, 0, 0, 128]);
    // 200 * 100 / 255 = 78.43
    expect(
      effectiveColor(stroke(new Color(10, 20, 30, 200), 1, 100)).rgba(),
    ).toEqual([10, 20, 30, 78]);
  });

  it("rounds to the nearest byte", () => {
    // 100 * 200 / 255 = 78.43, 255 * 1 / 255 = 1, 3 * 200 / 255 = 2.35
    expect(effectiveColor(fill(new Color(0, 0, 0, 100), 200)).a).toBe(78);
    expect(effectiveColor(fill(Color.BLUE, 1)).a).toBe(1);
    expect(effectiveColor(fill(new Color(0, 0, 0, 3), 200)).a).toBe(2);
  });

  it("makes a zero opacity fully transparent", () => {
    expect(effectiveColor(fill(Color.GREEN, 0)).rgba()).toEqual([0, 255, 0, 0]);
  });
});
