import type { Framebuffer } from "@pixelstage/core";

/**
 * Netpbm PAM header for an RGBA8 image. The header is ASCII and ends at
 * the newline after `ENDHDR`.
 */
export function pamHeader(width: number, height: number): string {
  return [
    "P7",
    `WIDTH ${width}`,
    `HEIGHT ${height}`,
    "DEPTH 4",
    "MAXVAL 255",
    "TUPLTYPE RGB_ALPHA",
    "ENDHDR",
    "",
  ].join("\n");
}

/**
 * Encode a framebuffer as a PAM (P7) image: the text header followed by
 * the framebuffer's packed RGBA bytes, unchanged.
 */
export function encodePam(fb: Framebuffer): Uint8Array {
  const header = new TextEncoder().encode(pamHeader(fb.width, fb.height));
  const pixels = fb.asBytes();

  const out = new Uint8Array(header.length + pixels.length);
  out.set(header, 0);
  out.set(pixels, header.length);
  return out;
}
