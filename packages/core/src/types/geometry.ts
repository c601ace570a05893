import type { Color } from "../style/color.js";
import type { Style } from "../style/style.js";

// ---- Primitive geometry ----

/** World-space point: origin at the framebuffer center, Y-up. */
export interface Point {
  x: number;
  y: number;
}

/** Pixel-space point: integer coordinates, origin top-left, Y-down. */
export interface PixelPoint {
  x: number;
  y: number;
}

export interface Dimensions {
  width: number;
  height: number;
}

// ---- Resolved frame (ready for rendering) ----

export interface ResolvedFrame {
  id: string;
  label: string;
  width: number;
  height: number;
  background: Color;
  commands: DrawCommand[];
  validation?: ValidationResult;
}

export type DrawCommand =
  | { kind: "line"; from: Point; to: Point; style: Style }
  | { kind: "circle"; center: Point; radius: number; style: Style }
  | {
      kind: "rectangle";
      center: Point;
      width: number;
      height: number;
      style: Style;
    }
  | { kind: "square"; center: Point; side: number; style: Style }
  | { kind: "triangle"; points: [Point, Point, Point]; style: Style }
  | { kind: "equilateral-triangle"; center: Point; side: number; style: Style }
  | { kind: "polygon"; points: Point[]; closed: boolean; style: Style };

export type DrawCommandKind = DrawCommand["kind"];

// ---- Validation ----

export type ValidationSeverity = "error" | "warning";

export interface ValidationIssue {
  code: string;
  severity: ValidationSeverity;
  message: string;
  shapeIndex: number | null;
  suggestion?: string;
}

export interface ValidationResult {
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}
