import { hasPaint } from "../style/style.js";
import type {
  DrawCommand,
  Point,
  ResolvedFrame,
  ValidationIssue,
  ValidationResult,
} from "../types/geometry.js";

interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

const SQRT3 = Math.sqrt(3);

/**
 * Linter-style pass over a resolved frame. Reports shapes the rasterizer
 * will skip or draw differently than written; never throws, and never
 * changes what gets drawn.
 */
export function validateFrame(frame: ResolvedFrame): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  frame.commands.forEach((cmd, index) => {
    checkPaint(cmd, index, warnings);
    checkFillIgnored(cmd, index, warnings);
    checkStrokeWidth(cmd, index, warnings);
    checkVertexCount(cmd, index, warnings);

    const pointsOk = checkPoints(cmd, index, warnings);
    const sizeOk = checkSize(cmd, index, warnings);
    if (pointsOk && sizeOk && commandPoints(cmd).length > 0) {
      checkOffCanvas(frame, cmd, index, warnings);
    }

    if (pointsOk && cmd.kind === "polygon" && cmd.closed) {
      checkSelfIntersection(cmd.points, index, errors);
    }
  });

  return { errors, warnings };
}

function checkPaint(
  cmd: DrawCommand,
  index: number,
  warnings: ValidationIssue[],
): void {
  if (hasPaint(cmd.style)) return;
  warnings.push({
    code: "no-paint",
    severity: "warning",
    message: `Shape ${index} (${cmd.kind}) has neither fill nor stroke and draws nothing`,
    shapeIndex: index,
    suggestion: "Add a fill or stroke, or remove the shape",
  });
}

function checkFillIgnored(
  cmd: DrawCommand,
  index: number,
  warnings: ValidationIssue[],
): void {
  if (!cmd.style.fill) return;
  const open = cmd.kind === "line" || (cmd.kind === "polygon" && !cmd.closed);
  if (!open) return;

  warnings.push({
    code: "fill-ignored",
    severity: "warning",
    message: `Shape ${index} (${cmd.kind}) is open; its fill is ignored`,
    shapeIndex: index,
    suggestion: cmd.kind === "polygon" ? "Set closed: true to fill it" : undefined,
  });
}

function checkStrokeWidth(
  cmd: DrawCommand,
  index: number,
  warnings: ValidationIssue[],
): void {
  const stroke = cmd.style.stroke;
  if (!stroke) return;
  if (Number.isFinite(stroke.width) && stroke.width > 0) return;

  warnings.push({
    code: "non-positive-stroke-width",
    severity: "warning",
    message: `Shape ${index} (${cmd.kind}) has stroke width ${stroke.width}; the stroke is skipped`,
    shapeIndex: index,
  });
}

function checkVertexCount(
  cmd: DrawCommand,
  index: number,
  warnings: ValidationIssue[],
): void {
  if (cmd.kind !== "polygon") return;
  const needed = cmd.closed ? 3 : 2;
  if (cmd.points.length >= needed) return;

  warnings.push({
    code: "too-few-points",
    severity: "warning",
    message: `Polygon ${index} has ${cmd.points.length} point(s); ${cmd.closed ? "a closed" : "an open"} polygon needs ${needed}`,
    shapeIndex: index,
  });
}

function commandPoints(cmd: DrawCommand): Point[] {
  switch (cmd.kind) {
    case "line":
      return [cmd.from, cmd.to];
    case "triangle":
    case "polygon":
      return cmd.points;
    case "circle":
    case "rectangle":
    case "square":
    case "equilateral-triangle":
      return [cmd.center];
  }
}

function isFinitePoint(p: Point): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y);
}

function checkPoints(
  cmd: DrawCommand,
  index: number,
  warnings: ValidationIssue[],
): boolean {
  if (commandPoints(cmd).every(isFinitePoint)) return true;

  warnings.push({
    code: "non-finite-point",
    severity: "warning",
    message: `Shape ${index} (${cmd.kind}) has a non-finite coordinate and is skipped`,
    shapeIndex: index,
  });
  return false;
}

function commandSizes(cmd: DrawCommand): Record<string, number> {
  switch (cmd.kind) {
    case "circle":
      return { radius: cmd.radius };
    case "rectangle":
      return { width: cmd.width, height: cmd.height };
    case "square":
    case "equilateral-triangle":
      return { side: cmd.side };
    default:
      return {};
  }
}

function checkSize(
  cmd: DrawCommand,
  index: number,
  warnings: ValidationIssue[],
): boolean {
  let ok = true;
  for (const [name, value] of Object.entries(commandSizes(cmd))) {
    if (Number.isFinite(value) && value > 0) continue;
    ok = false;
    warnings.push({
      code: "non-positive-size",
      severity: "warning",
      message: `Shape ${index} (${cmd.kind}) has ${name} ${value}; the shape is skipped`,
      shapeIndex: index,
    });
  }
  return ok;
}

function pointBounds(points: Point[]): Bounds {
  const bounds: Bounds = {
    minX: Infinity,
    minY: Infinity,
    maxX: -Infinity,
    maxY: -Infinity,
  };
  for (const p of points) {
    bounds.minX = Math.min(bounds.minX, p.x);
    bounds.minY = Math.min(bounds.minY, p.y);
    bounds.maxX = Math.max(bounds.maxX, p.x);
    bounds.maxY = Math.max(bounds.maxY, p.y);
  }
  return bounds;
}

function commandBounds(cmd: DrawCommand): Bounds {
  switch (cmd.kind) {
    case "line":
      return pointBounds([cmd.from, cmd.to]);
    case "triangle":
    case "polygon":
      return pointBounds(cmd.points);
    case "circle": {
      const r = Math.ceil(cmd.radius);
      return {
        minX: cmd.center.x - r,
        minY: cmd.center.y - r,
        maxX: cmd.center.x + r,
        maxY: cmd.center.y + r,
      };
    }
    case "rectangle":
      return {
        minX: cmd.center.x - cmd.width / 2,
        minY: cmd.center.y - cmd.height / 2,
        maxX: cmd.center.x + cmd.width / 2,
        maxY: cmd.center.y + cmd.height / 2,
      };
    case "square":
      return {
        minX: cmd.center.x - cmd.side / 2,
        minY: cmd.center.y - cmd.side / 2,
        maxX: cmd.center.x + cmd.side / 2,
        maxY: cmd.center.y + cmd.side / 2,
      };
    case "equilateral-triangle":
      return {
        minX: cmd.center.x - cmd.side / 2,
        minY: cmd.center.y - (SQRT3 / 6) * cmd.side,
        maxX: cmd.center.x + cmd.side / 2,
        maxY: cmd.center.y + (SQRT3 / 3) * cmd.side,
      };
  }
}

/**
 * Flags shapes whose bounding box, grown by the stroke, misses the canvas.
 * The canvas covers world x in [-width/2, width/2), likewise for y.
 */
function checkOffCanvas(
  frame: ResolvedFrame,
  cmd: DrawCommand,
  index: number,
  warnings: ValidationIssue[],
): void {
  const stroke = cmd.style.stroke;
  const margin =
    stroke && Number.isFinite(stroke.width) && stroke.width > 0
      ? Math.ceil(stroke.width / 2)
      : 0;
  const b = commandBounds(cmd);
  const halfW = frame.width / 2;
  const halfH = frame.height / 2;

  if (
    b.maxX + margin < -halfW ||
    b.minX - margin >= halfW ||
    b.maxY + margin < -halfH ||
    b.minY - margin >= halfH
  ) {
    warnings.push({
      code: "off-canvas",
      severity: "warning",
      message: `Shape ${index} (${cmd.kind}) lies entirely outside the ${frame.width}x${frame.height} canvas`,
      shapeIndex: index,
    });
  }
}

function orientation(a: Point, b: Point, c: Point): number {
  return Math.sign((b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x));
}

function segmentsCross(p1: Point, p2: Point, q1: Point, q2: Point): boolean {
  return (
    orientation(p1, p2, q1) * orientation(p1, p2, q2) < 0 &&
    orientation(q1, q2, p1) * orientation(q1, q2, p2) < 0
  );
}

/**
 * The even-odd fill assumes a simple polygon. Reports the first pair of
 * non-adjacent edges that properly cross.
 */
function checkSelfIntersection(
  points: Point[],
  index: number,
  errors: ValidationIssue[],
): void {
  const n = points.length;
  if (n < 4) return;

  for (let i = 0; i < n; i++) {
    for (let j = i + 2; j < n; j++) {
      // first and last edges share a vertex
      if (i === 0 && j === n - 1) continue;
      if (
        segmentsCross(
          points[i],
          points[(i + 1) % n],
          points[j],
          points[(j + 1) % n],
        )
      ) {
        errors.push({
          code: "self-intersecting-polygon",
          severity: "error",
          message: `Polygon ${index} crosses itself (edges ${i} and ${j})`,
          shapeIndex: index,
          suggestion: "Reorder the points so the outline does not cross itself",
        });
        return;
      }
    }
  }
}
