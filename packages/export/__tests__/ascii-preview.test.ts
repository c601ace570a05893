import {
  Color,
  Framebuffer,
  fill,
  parseScene,
  renderFrame,
  resolveScene,
  stroke,
} from "@pixelstage/core";
import { describe, expect, it } from "vitest";
import {
  legendFor,
  legendForFrame,
  renderAscii,
} from "../src/ascii-preview.js";

describe("legendFor", () => {
  it("lists the stroke before the fill", () => {
    expect(
      legendFor({ fill: fill(Color.RED), stroke: stroke(Color.WHITE) }),
    ).toEqual([
      { char: "S", color: Color.WHITE },
      { char: "F", color: Color.RED },
    ]);
  });

  it("uses the effective color", () => {
    const [entry] = legendFor({ fill: fill(Color.RED, 128) });
    expect(entry.color.rgba()).toEqual([255, 0, 0, 128]);
  });

  it("is empty without paint", () => {
    expect(legendFor({})).toEqual([]);
  });
});

describe("renderAscii", () => {
  it("prints one character per pixel", () => {
    const fb = new Framebuffer(3, 2);
    fb.setPixel(0, 0, Color.WHITE);
    fb.setPixel(1, 0, Color.RED);
    fb.setPixel(2, 1, Color.BLUE);

    const legend = [
      { char: "S", color: Color.WHITE },
      { char: "F", color: Color.RED },
    ];
    expect(renderAscii(fb, legend)).toBe("SF·\n··#");
  });

  it("marks every visible pixel as other without a legend", () => {
    const fb = new Framebuffer(2, 1);
    fb.setPixel(1, 0, Color.GREEN.withAlpha(1));
    expect(renderAscii(fb)).toBe("·#");
  });
});

describe("scene preview", () => {
  it("renders a stroked and filled circle", () => {
    const frame = resolveScene(
      parseScene(`
version: "0.1"
canvas: { width: 20, height: 15 }
frames:
  - id: circle
    shapes:
      - type: circle
        center: [1, 1]
        radius: 4
        fill: { color: red }
        stroke: { color: white }
`),
    );

    expect(legendForFrame(frame).map((e) => e.char)).toEqual(["S", "F"]);

    const rows = renderAscii(renderFrame(frame), legendForFrame(frame)).split("\n");
    expect(rows).toHaveLength(15);
    expect(rows[0]).toBe("····················");
    expect(rows[1]).toBe("···········S········");
    expect(rows[6]).toBe("······SFFFFFFFFFS···");
    expect(rows[11]).toBe("···········S········");
  });
});
