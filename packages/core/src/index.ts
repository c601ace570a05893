export * from "./types/config.js";
export * from "./types/geometry.js";
export { Color, NAMED_COLORS, type ColorName, type Rgba } from "./style/color.js";
export * from "./style/style.js";
export {
  BYTES_PER_PIXEL,
  Framebuffer,
  roundHalfAwayFromZero,
} from "./framebuffer.js";
export { Path, fillPathPx, strokePathPx, strokeCorners } from "./path.js";
export { clipLine, drawLinePx, type ClipRect } from "./raster/line.js";
export { circleRadii, drawCirclePx, type CircleRadii } from "./raster/circle.js";
export { fillTrianglePx } from "./raster/triangle.js";
export * from "./shapes/index.js";
export { parseColor } from "./parser/color-parser.js";
export { SceneError, parseScene } from "./parser/scene-parser.js";
export {
  resolveAllFrames,
  resolveScene,
  resolveStyle,
} from "./resolver/scene-resolver.js";
export { validateFrame } from "./resolver/validation.js";
export { drawCommand, renderFrame } from "./renderer/frame-renderer.js";
