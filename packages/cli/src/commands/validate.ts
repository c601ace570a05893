import {
  type ResolvedFrame,
  type ValidationIssue,
  resolveScene,
  validateFrame,
} from "@pixelstage/core";
import { exitWithError, loadScene } from "./shared.js";

interface ValidateOptions {
  frame?: string;
}

function issueSection(
  title: string,
  marker: string,
  issues: readonly ValidationIssue[],
): string[] {
  if (issues.length === 0) return [];
  return [
    `${issues.length} ${title}(s):`,
    ...issues.flatMap((issue) => {
      const head = `  ${marker} [${issue.code}] ${issue.message}`;
      return issue.suggestion ? [head, `    → ${issue.suggestion}`] : [head];
    }),
  ];
}

/**
 * Human-readable validation report for a frame: errors, then warnings,
 * then a one-line summary.
 */
export function formatValidation(frame: ResolvedFrame): string {
  const { errors, warnings } = frame.validation ?? validateFrame(frame);
  if (errors.length === 0 && warnings.length === 0) {
    return `✓ Frame "${frame.id}" is valid. No issues found.`;
  }

  return [
    ...issueSection("error", "✗", errors),
    ...issueSection("warning", "⚠", warnings),
    `Summary: ${errors.length} error(s), ${warnings.length} warning(s)`,
  ].join("\n");
}

export function validateCommand(input: string, options: ValidateOptions): void {
  let frame: ResolvedFrame;
  try {
    frame = resolveScene(loadScene(input), options.frame);
  } catch (err) {
    exitWithError(err);
  }

  const report = formatValidation(frame);
  if (frame.validation?.errors.length) {
    console.error(report);
    process.exitCode = 1;
  } else {
    console.log(report);
  }
}
