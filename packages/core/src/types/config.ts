import { z } from "zod";
import type { ColorName } from "../style/color.js";

// ---- Config interfaces ----

export type PointConfig = [number, number];
export type RgbaConfig = [number, number, number, number];

/** Named color, hex string (`#rgb`, `#rrggbb`, `#rrggbbaa`) or byte tuple */
export type ColorConfig = ColorName | string | RgbaConfig;

export interface SceneConfig {
  version: string;
  canvas: CanvasConfig;
  frames: FrameConfig[];
}

export interface CanvasConfig {
  width: number;
  height: number;
  background?: ColorConfig;
}

export interface FrameConfig {
  id: string;
  label?: string;
  clear?: ColorConfig;
  shapes: ShapeConfig[];
}

export interface FillConfig {
  color: ColorConfig;
  opacity?: number;
}

export interface StrokeConfig extends FillConfig {
  width?: number;
}

export interface PaintConfig {
  fill?: FillConfig;
  stroke?: StrokeConfig;
}

export interface LineConfig extends PaintConfig {
  type: "line";
  from: PointConfig;
  to: PointConfig;
}

export interface CircleConfig extends PaintConfig {
  type: "circle";
  center: PointConfig;
  radius: number;
}

export interface RectangleConfig extends PaintConfig {
  type: "rectangle";
  center: PointConfig;
  width: number;
  height: number;
}

export interface SquareConfig extends PaintConfig {
  type: "square";
  center: PointConfig;
  side: number;
}

export interface TriangleConfig extends PaintConfig {
  type: "triangle";
  points: [PointConfig, PointConfig, PointConfig];
}

export interface EquilateralTriangleConfig extends PaintConfig {
  type: "equilateral-triangle";
  center: PointConfig;
  side: number;
}

export interface PolygonConfig extends PaintConfig {
  type: "polygon";
  points: PointConfig[];
  closed?: boolean;
}

export type ShapeConfig =
  | LineConfig
  | CircleConfig
  | RectangleConfig
  | SquareConfig
  | TriangleConfig
  | EquilateralTriangleConfig
  | PolygonConfig;

export type ShapeType = ShapeConfig["type"];

// ---- Zod schemas for runtime validation ----

const ByteSchema = z.number().int().min(0).max(255);
const HEX_COLOR = /^#(?:[0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

const ColorSchema = z.union([
  z.enum(["transparent", "black", "white", "red", "green", "blue"]),
  z.string().regex(HEX_COLOR, "Expected a color name or #rgb/#rrggbb/#rrggbbaa"),
  z.tuple([ByteSchema, ByteSchema, ByteSchema, ByteSchema]),
]);

// geometry stays permissive: NaN, infinities and non-positive sizes are
// skipped at draw time
const GeometrySchema = z.union([z.number(), z.nan()]);
const PointSchema = z.tuple([GeometrySchema, GeometrySchema]);

const FillSchema = z.object({
  color: ColorSchema,
  opacity: ByteSchema.optional(),
});

const StrokeSchema = FillSchema.extend({
  width: GeometrySchema.optional(),
});

const paint = {
  fill: FillSchema.optional(),
  stroke: StrokeSchema.optional(),
};

const ShapeSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("line"), from: PointSchema, to: PointSchema, ...paint }),
  z.object({
    type: z.literal("circle"),
    center: PointSchema,
    radius: GeometrySchema,
    ...paint,
  }),
  z.object({
    type: z.literal("rectangle"),
    center: PointSchema,
    width: GeometrySchema,
    height: GeometrySchema,
    ...paint,
  }),
  z.object({
    type: z.literal("square"),
    center: PointSchema,
    side: GeometrySchema,
    ...paint,
  }),
  z.object({
    type: z.literal("triangle"),
    points: z.tuple([PointSchema, PointSchema, PointSchema]),
    ...paint,
  }),
  z.object({
    type: z.literal("equilateral-triangle"),
    center: PointSchema,
    side: GeometrySchema,
    ...paint,
  }),
  z.object({
    type: z.literal("polygon"),
    points: z.array(PointSchema),
    closed: z.boolean().optional(),
    ...paint,
  }),
]);

const CanvasSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  background: ColorSchema.optional(),
});

const FrameSchema = z.object({
  id: z.string(),
  label: z.string().optional(),
  clear: ColorSchema.optional(),
  shapes: z.array(ShapeSchema),
});

export const SceneConfigSchema: z.ZodType<SceneConfig> = z.object({
  version: z.string(),
  canvas: CanvasSchema,
  frames: z.array(FrameSchema).min(1, "A scene needs at least one frame"),
});
