import { Framebuffer } from "../framebuffer.js";
import { circle } from "../shapes/circles.js";
import { line } from "../shapes/lines.js";
import { polygon } from "../shapes/polygons.js";
import { rectangle, square } from "../shapes/rectangles.js";
import { equilateralTriangle, triangle } from "../shapes/triangles.js";
import type { DrawCommand, ResolvedFrame } from "../types/geometry.js";

/**
 * Draw one command onto `fb` through its world-space shape entry point.
 */
export function drawCommand(fb: Framebuffer, cmd: DrawCommand): void {
  switch (cmd.kind) {
    case "line":
      line(fb, cmd.from, cmd.to, cmd.style);
      break;
    case "circle":
      circle(fb, cmd.center, cmd.radius, cmd.style);
      break;
    case "rectangle":
      rectangle(fb, cmd.center, cmd.width, cmd.height, cmd.style);
      break;
    case "square":
      square(fb, cmd.center, cmd.side, cmd.style);
      break;
    case "triangle": {
      const [a, b, c] = cmd.points;
      triangle(fb, a, b, c, cmd.style);
      break;
    }
    case "equilateral-triangle":
      equilateralTriangle(fb, cmd.center, cmd.side, cmd.style);
      break;
    case "polygon":
      polygon(fb, cmd.points, cmd.style, cmd.closed);
      break;
  }
}

/**
 * Render a resolved frame: clear to its background, then draw every command
 * in order. Reuses `target` when given; it must match the frame's size.
 */
export function renderFrame(
  frame: ResolvedFrame,
  target?: Framebuffer,
): Framebuffer {
  const fb = target ?? new Framebuffer(frame.width, frame.height);
  if (fb.width !== frame.width || fb.height !== frame.height) {
    throw new Error(
      `Framebuffer is ${fb.width}x${fb.height} but frame "${frame.id}" is ${frame.width}x${frame.height}`,
    );
  }

  fb.clear(frame.background);
  for (const cmd of frame.commands) {
    drawCommand(fb, cmd);
  }
  return fb;
}
