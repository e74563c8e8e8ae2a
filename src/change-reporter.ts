// src/change-reporter.ts — Change Reporter
// Classifies an update as no-change / created / modified and renders it.
// Classification never writes; callers persist only when `shouldPersist`.

import { diff, type DiffOptions } from "./diff-engine.js";
import { formatDiffOutput, statusNoChange, statusCreated, dim } from "./presentation.js";
import type { ChangeRecord, Presentation, RunMode } from "./types.js";

/**
 * `oldText` is undefined when the document did not exist. An absent or
 * empty original with non-empty new content is "created", reported as an
 * all-added diff.
 */
export function classifyChange(
  oldText: string | undefined,
  newText: string,
  label: string,
  mode: RunMode,
  options: DiffOptions = {},
): ChangeRecord {
  if ((oldText === undefined || oldText === "") && newText !== "") {
    return { label, kind: "created", mode, diff: diff("", newText, label, options).diff };
  }

  const result = diff(oldText ?? "", newText, label, options);
  return {
    label,
    kind: result.changed ? "modified" : "no-change",
    mode,
    diff: result.diff,
  };
}

export function shouldPersist(record: ChangeRecord): boolean {
  return record.mode === "apply" && record.kind !== "no-change";
}

/**
 * Render a change record for the terminal: a status line, then the diff.
 */
export function formatChangeReport(record: ChangeRecord, presentation: Presentation): string {
  const dryRun = record.mode === "dry-run" ? ` ${dim("(dry run)", presentation)}` : "";

  switch (record.kind) {
    case "no-change":
      return statusNoChange(record.label, presentation);
    case "created":
      return `${statusCreated(record.label, presentation)}${dryRun}\n${formatDiffOutput(record.diff, presentation)}`;
    case "modified":
      return `${record.label}:${dryRun}\n${formatDiffOutput(record.diff, presentation)}`;
  }
}
