import {
  type ResolvedFrame,
  renderFrame,
  resolveAllFrames,
  resolveScene,
} from "@pixelstage/core";
import { legendForFrame, renderAscii } from "@pixelstage/export";
import { exitWithError, loadScene } from "./shared.js";

interface PreviewOptions {
  frame?: string;
  all?: boolean;
}

/** ASCII art for one frame, followed by its label and a blank line. */
export function previewFrame(frame: ResolvedFrame): string {
  const fb = renderFrame(frame);
  return `${renderAscii(fb, legendForFrame(frame))}\n${frame.label}\n`;
}

export function previewCommand(input: string, options: PreviewOptions): void {
  try {
    const scene = loadScene(input);
    const frames = options.all
      ? resolveAllFrames(scene)
      : [resolveScene(scene, options.frame)];

    for (const frame of frames) {
      console.log(previewFrame(frame));
    }
  } catch (err) {
    exitWithError(err);
  }
}
