import { parseColor } from "../parser/color-parser.js";
import { Color } from "../style/color.js";
import { fill, stroke, type Fill, type Stroke, type Style } from "../style/style.js";
import type {
  FrameConfig,
  PaintConfig,
  PointConfig,
  SceneConfig,
  ShapeConfig,
} from "../types/config.js";
import type { DrawCommand, Point, ResolvedFrame } from "../types/geometry.js";
import { validateFrame } from "./validation.js";

/**
 * Resolve one frame of a parsed SceneConfig into a ResolvedFrame ready for
 * rendering. Colors and paints become value types; geometry passes through
 * untouched, invalid or not.
 */
export function resolveScene(
  config: SceneConfig,
  frameId?: string,
): ResolvedFrame {
  const frame = frameId
    ? config.frames.find((f) => f.id === frameId)
    : config.frames[0];

  if (!frame) {
    throw new Error(
      frameId
        ? `Frame "${frameId}" not found in scene`
        : "No frames found in scene",
    );
  }

  return resolveFrame(config, frame);
}

/** Resolve every frame, in order. */
export function resolveAllFrames(config: SceneConfig): ResolvedFrame[] {
  return config.frames.map((frame) => resolveFrame(config, frame));
}

function resolveFrame(config: SceneConfig, frame: FrameConfig): ResolvedFrame {
  const clearColor = frame.clear ?? config.canvas.background;

  const resolved: ResolvedFrame = {
    id: frame.id,
    label: frame.label ?? frame.id,
    width: config.canvas.width,
    height: config.canvas.height,
    background: clearColor !== undefined ? parseColor(clearColor) : Color.TRANSPARENT,
    commands: frame.shapes.map(resolveShape),
  };

  resolved.validation = validateFrame(resolved);

  return resolved;
}

function toPoint([x, y]: PointConfig): Point {
  return { x, y };
}

export function resolveStyle(paint: PaintConfig): Style {
  let fillPaint: Fill | undefined;
  let strokePaint: Stroke | undefined;

  if (paint.fill) {
    fillPaint = fill(parseColor(paint.fill.color), paint.fill.opacity);
  }
  if (paint.stroke) {
    strokePaint = stroke(
      parseColor(paint.stroke.color),
      paint.stroke.width,
      paint.stroke.opacity,
    );
  }

  if (fillPaint && strokePaint) return { fill: fillPaint, stroke: strokePaint };
  if (fillPaint) return { fill: fillPaint };
  if (strokePaint) return { stroke: strokePaint };
  return {};
}

function resolveShape(shape: ShapeConfig): DrawCommand {
  const style = resolveStyle(shape);

  switch (shape.type) {
    case "line":
      return { kind: "line", from: toPoint(shape.from), to: toPoint(shape.to), style };
    case "circle":
      return { kind: "circle", center: toPoint(shape.center), radius: shape.radius, style };
    case "rectangle":
      return {
        kind: "rectangle",
        center: toPoint(shape.center),
        width: shape.width,
        height: shape.height,
        style,
      };
    case "square":
      return { kind: "square", center: toPoint(shape.center), side: shape.side, style };
    case "triangle": {
      const [a, b, c] = shape.points;
      return {
        kind: "triangle",
        points: [toPoint(a), toPoint(b), toPoint(c)],
        style,
      };
    }
    case "equilateral-triangle":
      return {
        kind: "equilateral-triangle",
        center: toPoint(shape.center),
        side: shape.side,
        style,
      };
    case "polygon":
      return {
        kind: "polygon",
        points: shape.points.map(toPoint),
        closed: shape.closed ?? true,
        style,
      };
  }
}
