// src/presentation.ts — Terminal rendering of diffs and status lines
// Color is an explicit setting; nothing here reads the environment.

import { Chalk, type ChalkInstance } from "chalk";
import type { Presentation } from "./types.js";

export function createPalette(presentation: Presentation): ChalkInstance {
  return new Chalk({ level: presentation.color ? 1 : 0 });
}

/**
 * Decide once whether color output is allowed: off when NO_COLOR is set
 * or the terminal is "dumb".
 */
export function colorAllowed(env: NodeJS.ProcessEnv): boolean {
  return !env.NO_COLOR && env.TERM !== "dumb";
}

/** Color a unified diff by line prefix. */
export function colorizeDiff(diff: string, presentation: Presentation): string {
  if (!presentation.color) return diff;
  const c = createPalette(presentation);
  return diff
    .split("\n")
    .map((line) => {
      if (line.startsWith("+++") || line.startsWith("---")) return c.dim(line);
      if (line.startsWith("+")) return c.green(line);
      if (line.startsWith("-")) return c.red(line);
      if (line.startsWith("@@")) return c.cyan(line);
      return line;
    })
    .join("\n");
}

/**
 * Colorize, then truncate to `maxDiffLines` when set, noting how many lines
 * were left out. The diff text itself is never altered.
 */
export function formatDiffOutput(diff: string, presentation: Presentation): string {
  const colored = colorizeDiff(diff, presentation);
  const max = presentation.maxDiffLines;
  if (max === undefined) return colored;

  const lines = colored.split("\n");
  if (lines.length <= max) return colored;
  const c = createPalette(presentation);
  return [...lines.slice(0, max), c.dim(`... (${lines.length - max} more lines)`)].join("\n");
}

export function statusNoChange(label: string, presentation: Presentation): string {
  return createPalette(presentation).dim(`${label}: no changes`);
}

export function statusCreated(label: string, presentation: Presentation): string {
  return createPalette(presentation).green(`${label}: created`);
}

export function statusError(message: string, presentation: Presentation): string {
  return createPalette(presentation).red(message);
}

export function dim(message: string, presentation: Presentation): string {
  return createPalette(presentation).dim(message);
}
