import type { Framebuffer } from "../framebuffer.js";
import type { Color } from "../style/color.js";
import type { PixelPoint } from "../types/geometry.js";
import { fixedCeil, fixedDiv, fixedMulInt, toFixed } from "./fixed-point.js";

function sortByY(
  a: PixelPoint,
  b: PixelPoint,
  c: PixelPoint,
): [PixelPoint, PixelPoint, PixelPoint] {
  const [v1, v2, v3] = [a, b, c].sort((p, q) => p.y - q.y);
  return [v1, v2, v3];
}

/**
 * Walks scanlines `yTop` (inclusive) to `yBottom` (exclusive), stepping two
 * fixed-point edge positions and filling the span between them. The right
 * bound is pulled in by one so adjacent fills never overlap. Rows outside
 * the framebuffer are skipped by advancing both edges in one step.
 */
function walkEdges(
  fb: Framebuffer,
  yTop: number,
  yBottom: number,
  startA: number,
  slopeA: number,
  startB: number,
  slopeB: number,
  color: Color,
): void {
  const first = Math.max(yTop, 0);
  const last = Math.min(yBottom, fb.height);
  const skipped = first - yTop;

  let curA = startA + slopeA * skipped;
  let curB = startB + slopeB * skipped;
  for (let y = first; y < last; y++) {
    const xa = fixedCeil(curA);
    const xb = fixedCeil(curB);
    const left = Math.min(xa, xb);
    const right = Math.max(xa, xb) - 1;
    if (left <= right) {
      fb.fillSpan(y, left, right, color);
    }
    curA += slopeA;
    curB += slopeB;
  }
}

/** Fills a triangle where `v1.y <= v2.y === v3.y`. */
function fillFlatBottom(
  fb: Framebuffer,
  v1: PixelPoint,
  v2: PixelPoint,
  v3: PixelPoint,
  color: Color,
): void {
  const dy1 = v2.y - v1.y;
  const dy2 = v3.y - v1.y;
  if (dy1 === 0 || dy2 === 0) return;

  walkEdges(
    fb,
    v1.y,
    v2.y,
    toFixed(v1.x),
    fixedDiv(v2.x - v1.x, dy1),
    toFixed(v1.x),
    fixedDiv(v3.x - v1.x, dy2),
    color,
  );
}

/** Fills a triangle where `v1.y === v2.y <= v3.y`. */
function fillFlatTop(
  fb: Framebuffer,
  v1: PixelPoint,
  v2: PixelPoint,
  v3: PixelPoint,
  color: Color,
): void {
  const dy1 = v3.y - v1.y;
  const dy2 = v3.y - v2.y;
  if (dy1 === 0 || dy2 === 0) return;

  walkEdges(
    fb,
    v1.y,
    v3.y,
    toFixed(v1.x),
    fixedDiv(v3.x - v1.x, dy1),
    toFixed(v2.x),
    fixedDiv(v3.x - v2.x, dy2),
    color,
  );
}

/**
 * Scanline fill of an arbitrary triangle in pixel coordinates. A general
 * triangle is split at the middle vertex's row into a flat-bottom and a
 * flat-top half. Triangles with all vertices on one row draw nothing.
 */
export function fillTrianglePx(
  fb: Framebuffer,
  a: PixelPoint,
  b: PixelPoint,
  c: PixelPoint,
  color: Color,
): void {
  const [v1, v2, v3] = sortByY(a, b, c);
  if (v1.y === v3.y) return;

  if (v2.y === v3.y) {
    fillFlatBottom(fb, v1, v2, v3, color);
  } else if (v1.y === v2.y) {
    fillFlatTop(fb, v1, v2, v3, color);
  } else {
    // point on the long edge at the middle vertex's row
    const t = fixedDiv(v2.y - v1.y, v3.y - v1.y);
    const v4 = { x: v1.x + fixedMulInt(t, v3.x - v1.x), y: v2.y };

    fillFlatBottom(fb, v1, v2, v4, color);
    fillFlatTop(fb, v2, v4, v3, color);
  }
}
