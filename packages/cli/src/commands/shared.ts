import { readFileSync } from "node:fs";
import { type SceneConfig, parseScene } from "@pixelstage/core";

/** Read and parse a scene file. */
export function loadScene(path: string): SceneConfig {
  return parseScene(readFileSync(path, "utf-8"));
}

/** Command boundary: print the error and exit with status 1. */
export function exitWithError(err: unknown): never {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
