export { line } from "./lines.js";
export { circle } from "./circles.js";
export { rectangle, square } from "./rectangles.js";
export { triangle, equilateralTriangle } from "./triangles.js";
export { polygon } from "./polygons.js";
