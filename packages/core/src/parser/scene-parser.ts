import yaml from "js-yaml";
import type { ZodError } from "zod";
import type { SceneConfig } from "../types/config.js";
import { SceneConfigSchema } from "../types/config.js";

/**
 * A scene document that parsed but broke the schema. `issues` holds one
 * `path: message` entry per violation; the message lists them all.
 */
export class SceneError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(["Invalid scene:", ...issues.map((issue) => `  - ${issue}`)].join("\n"));
    this.name = "SceneError";
    this.issues = issues;
  }

  static fromZod(error: ZodError): SceneError {
    return new SceneError(
      error.issues.map(({ path, message }) => `${path.join(".")}: ${message}`),
    );
  }
}

type JsonAttempt = { ok: true; value: unknown } | { ok: false };

function tryJson(input: string): JsonAttempt {
  try {
    return { ok: true, value: JSON.parse(input) };
  } catch {
    return { ok: false };
  }
}

/** JSON when the text is JSON, YAML otherwise. */
function loadDocument(input: string): unknown {
  const json = tryJson(input);
  if (json.ok) return json.value;

  try {
    return yaml.load(input);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse input as JSON or YAML: ${reason}`);
  }
}

/**
 * Parse scene text (JSON or YAML) into a validated SceneConfig. Throws a
 * SceneError when the document breaks the schema.
 */
export function parseScene(input: string): SceneConfig {
  const result = SceneConfigSchema.safeParse(loadDocument(input));
  if (!result.success) throw SceneError.fromZod(result.error);
  return result.data;
}
