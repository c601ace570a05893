import { type Framebuffer, roundHalfAwayFromZero } from "./framebuffer.js";
import { drawLinePx } from "./raster/line.js";
import { fillTrianglePx } from "./raster/triangle.js";
import type { Color } from "./style/color.js";
import { effectiveColor, hasPaint, type Style } from "./style/style.js";
import type { PixelPoint, Point } from "./types/geometry.js";

/**
 * Ordered world-space vertices, optionally closed back to the first.
 * Every polygonal shape renders through a Path.
 */
export class Path {
  constructor(
    readonly nodes: readonly Point[],
    readonly closed: boolean,
  ) {}

  /**
   * Converts every node to pixel space, or returns `null` if any node is
   * unrepresentable.
   */
  toPixels(fb: Framebuffer): PixelPoint[] | null {
    const out: PixelPoint[] = [];
    for (const node of this.nodes) {
      const px = fb.worldToPixel(node);
      if (!px) return null;
      out.push(px);
    }
    return out;
  }

  /**
   * Fill first (closed paths only), then the stroke on top.
   */
  render(fb: Framebuffer, style: Style): void {
    const nodesPx = this.toPixels(fb);
    if (!nodesPx) return;
    if (!hasPaint(style)) return;

    if (this.closed && style.fill) {
      fillPathPx(fb, nodesPx, effectiveColor(style.fill));
    }

    if (style.stroke) {
      strokePathPx(
        fb,
        nodesPx,
        this.closed,
        style.stroke.width,
        effectiveColor(style.stroke),
      );
    }
  }
}

function edges(
  nodesPx: readonly PixelPoint[],
  closed: boolean,
): [PixelPoint, PixelPoint][] {
  const out: [PixelPoint, PixelPoint][] = [];
  for (let i = 0; i + 1 < nodesPx.length; i++) {
    out.push([nodesPx[i], nodesPx[i + 1]]);
  }
  if (closed && nodesPx.length > 1) {
    out.push([nodesPx[nodesPx.length - 1], nodesPx[0]]);
  }
  return out;
}

/**
 * Even-odd scanline fill. Spans stop one pixel short of each crossing so
 * the boundary pixels stay free for the stroke.
 */
export function fillPathPx(
  fb: Framebuffer,
  nodesPx: readonly PixelPoint[],
  color: Color,
): void {
  if (nodesPx.length < 3) return;

  let ymin = nodesPx[0].y;
  let ymax = nodesPx[0].y;
  for (const p of nodesPx) {
    ymin = Math.min(ymin, p.y);
    ymax = Math.max(ymax, p.y);
  }
  if (ymin >= ymax) return;

  const y0 = Math.max(ymin, 0);
  const y1 = Math.min(ymax, fb.height - 1);
  if (y0 > y1) return;

  const polygonEdges = edges(nodesPx, true);
  const crossings: number[] = [];

  for (let y = y0; y <= y1; y++) {
    crossings.length = 0;

    for (const [p1, p2] of polygonEdges) {
      if (p1.y === p2.y) continue;
      const ylo = Math.min(p1.y, p2.y);
      const yhi = Math.max(p1.y, p2.y);
      // half-open so a shared vertex is counted once
      if (y < ylo || y >= yhi) continue;

      const x = p1.x + ((y - p1.y) * (p2.x - p1.x)) / (p2.y - p1.y);
      crossings.push(Math.floor(x));
    }

    crossings.sort((a, b) => a - b);

    for (let j = 0; j + 1 < crossings.length; j += 2) {
      const left = crossings[j] + 1;
      const right = crossings[j + 1] - 1;
      if (left <= right) {
        fb.fillSpan(y, left, right, color);
      }
    }
  }
}

/**
 * Corners of an edge thickened to `width`: offset by half the width along
 * the normal and extended by half the width past each end.
 * Order: `[p1+o, p2+o, p2-o, p1-o]`.
 */
export function strokeCorners(
  p1: PixelPoint,
  p2: PixelPoint,
  width: number,
): [PixelPoint, PixelPoint, PixelPoint, PixelPoint] | null {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  const len = Math.hypot(dx, dy);
  if (len === 0) return null;

  const half = width * 0.5;
  const tx = (dx / len) * half;
  const ty = (dy / len) * half;
  const ox = -ty;
  const oy = tx;

  const sx = p1.x - tx;
  const sy = p1.y - ty;
  const ex = p2.x + tx;
  const ey = p2.y + ty;

  const corner = (x: number, y: number): PixelPoint => ({
    x: roundHalfAwayFromZero(x) + 0,
    y: roundHalfAwayFromZero(y) + 0,
  });

  return [
    corner(sx + ox, sy + oy),
    corner(ex + ox, ey + oy),
    corner(ex - ox, ey - oy),
    corner(sx - ox, sy - oy),
  ];
}

/**
 * Strokes every edge (and the closing edge of a closed path). Widths up to
 * one pixel draw Bresenham lines; wider strokes fill one quad per edge.
 * Non-finite or non-positive widths draw nothing.
 */
export function strokePathPx(
  fb: Framebuffer,
  nodesPx: readonly PixelPoint[],
  closed: boolean,
  width: number,
  color: Color,
): void {
  if (nodesPx.length < 2) return;
  if (!Number.isFinite(width) || width <= 0) return;

  for (const [p1, p2] of edges(nodesPx, closed)) {
    if (width <= 1) {
      drawLinePx(fb, p1, p2, color);
      continue;
    }

    const quad = strokeCorners(p1, p2, width);
    if (!quad) continue;
    const [a, b, c, d] = quad;
    fillTrianglePx(fb, a, b, c, color);
    fillTrianglePx(fb, a, c, d, color);
  }
}
