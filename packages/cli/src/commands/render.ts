import { writeFileSync } from "node:fs";
import { renderFrame, resolveScene } from "@pixelstage/core";
import { encodePam } from "@pixelstage/export";
import { exitWithError, loadScene } from "./shared.js";

interface RenderOptions {
  output?: string;
  frame?: string;
}

/** Default output path: `<input>.pam`, or `<input>-<frame>.pam`. */
export function defaultOutputPath(input: string, frameId?: string): string {
  const base = input.replace(/\.(ya?ml|json)$/i, "");
  return frameId ? `${base}-${frameId}.pam` : `${base}.pam`;
}

export function renderCommand(input: string, options: RenderOptions): void {
  try {
    const frame = resolveScene(loadScene(input), options.frame);
    const fb = renderFrame(frame);

    const outputPath = options.output ?? defaultOutputPath(input, options.frame);
    writeFileSync(outputPath, encodePam(fb));
    console.log(`Rendered: ${outputPath} (${fb.width}x${fb.height})`);
  } catch (err) {
    exitWithError(err);
  }
}
