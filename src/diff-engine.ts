// src/diff-engine.ts — Diff Engine
// Unified diffs between two versions of a document. Line matching comes from
// jsdiff (an LCS/shortest-edit-script matcher); headers and hunk ranges are
// rendered here so the output format is fixed regardless of library defaults.

import { structuredPatch } from "diff";
import jsonc, { type FormattingOptions, type ParseError, type ParseOptions } from "jsonc-parser";

export const DEFAULT_CONTEXT_LINES = 3;

export interface DiffResult {
  changed: boolean;
  diff: string;
}

export interface DiffOptions {
  /** "auto" treats labels ending in .json as JSON. Default "auto". */
  format?: "text" | "json" | "auto";
  context?: number;
}

/**
 * Diff two documents, normalizing JSON first when the format calls for it.
 */
export function diff(
  oldText: string,
  newText: string,
  label: string,
  options: DiffOptions = {},
): DiffResult {
  const format = options.format ?? "auto";
  const asJson = format === "json" || (format === "auto" && /\.json$/i.test(label));
  return asJson
    ? diffJson(oldText, newText, label, options.context)
    : diffText(oldText, newText, label, options.context);
}

export function diffText(
  oldText: string,
  newText: string,
  label: string,
  context = DEFAULT_CONTEXT_LINES,
): DiffResult {
  if (oldText === newText) return { changed: false, diff: "" };
  return { changed: true, diff: renderUnifiedDiff(oldText, newText, label, context) };
}

/**
 * Both sides are re-indented to two spaces before diffing. Only whitespace
 * between tokens changes: key order and number text stay as authored. If
 * either side is not strict JSON, both are diffed raw.
 */
export function diffJson(
  oldText: string,
  newText: string,
  label: string,
  context = DEFAULT_CONTEXT_LINES,
): DiffResult {
  if (oldText === newText) return { changed: false, diff: "" };

  const oldNormalized = normalizeJson(oldText);
  const newNormalized = normalizeJson(newText);
  if (oldNormalized === undefined || newNormalized === undefined) {
    return diffText(oldText, newText, label, context);
  }
  return diffText(oldNormalized, newNormalized, label, context);
}

const STRICT_JSON: ParseOptions = { disallowComments: true, allowTrailingComma: false };
const JSON_LAYOUT: FormattingOptions = { tabSize: 2, insertSpaces: true, eol: "\n" };

function normalizeJson(text: string): string | undefined {
  const errors: ParseError[] = [];
  jsonc.parse(text, errors, STRICT_JSON);
  if (errors.length > 0 || text.trim() === "") return undefined;
  return jsonc.applyEdits(text, jsonc.format(text, undefined, JSON_LAYOUT)).trim() + "\n";
}

function renderUnifiedDiff(oldText: string, newText: string, label: string, context: number): string {
  const patch = structuredPatch(`a/${label}`, `b/${label}`, oldText, newText, undefined, undefined, { context });
  const out = [`--- a/${label}`, `+++ b/${label}`];
  for (const hunk of patch.hunks) {
    out.push(`@@ -${hunkRange(hunk.oldStart, hunk.oldLines)} +${hunkRange(hunk.newStart, hunk.newLines)} @@`);
    out.push(...(oldText === "" ? dropEmptySideMarkers(hunk.lines, newText) : hunk.lines));
  }
  return out.join("\n");
}

// An empty range names the line before it: inserting into an empty file is -0,0
function hunkRange(start: number, count: number): string {
  return `${count === 0 ? Math.max(0, start - 1) : start},${count}`;
}

// An empty old side has no final line to lack a newline; only the new side's
// trailing marker can apply
function dropEmptySideMarkers(lines: string[], newText: string): string[] {
  return lines.filter(
    (line, i) => !line.startsWith("\\") || (i === lines.length - 1 && !newText.endsWith("\n")),
  );
}
