// src/merge-engine.ts — Merge Engine
// Splices a freshly rendered fragment into an existing document.
// Pure: returns new text, never touches storage.
//
//   badge-block      found  → swap the whole block for the new one
//   badge-block      absent → insert after the title (or at the start)
//   install-section  found  → keep the existing section untouched
//   install-section  absent → insert before a well-known section (or at the
//                             end), unless the package status suppresses it

import {
  splitLines,
  joinLines,
  detectEol,
  fragmentLines,
  spliceLines,
  insertBlock,
  type Line,
} from "./document.js";
import { locateBadgeBlock, locateInstallSection, isBadgeLine, isInstallHeading } from "./section-locator.js";
import {
  INSTALL_SUPPRESSED_STATUSES,
  InvalidFragmentError,
  type Fragment,
  type Manifest,
  type MergeAction,
  type MergeResult,
} from "./types.js";

export type MergeContext = Pick<Manifest, "status">;

/** Whether an installation section belongs in a README for this status. */
export function isInstallApplicable(status: string): boolean {
  return !INSTALL_SUPPRESSED_STATUSES.some((s) => s === status.toLowerCase());
}

/**
 * Merge one fragment into a document.
 * Running it again with the same fragment returns the same text.
 */
export function mergeFragment(
  document: string,
  fragment: Fragment,
  context: MergeContext,
): MergeResult {
  const lines = splitLines(document);
  const texts = fragmentLines(fragment.text);
  validateFragment(fragment, texts);

  const { lines: merged, action } = fragment.kind === "badge-block"
    ? mergeBadgeBlock(lines, texts)
    : mergeInstallSection(lines, texts, context);

  const content = joinLines(merged);
  return { content, action, changed: content !== document };
}

/**
 * `mergeFragment` without the bookkeeping.
 */
export function merge(document: string, fragment: Fragment, context: MergeContext): string {
  return mergeFragment(document, fragment, context).content;
}

/**
 * Apply fragments in order, each pass working on the previous pass's output.
 */
export function mergeAll(
  document: string,
  fragments: readonly Fragment[],
  context: MergeContext,
): { content: string; actions: MergeAction[] } {
  let content = document;
  const actions: MergeAction[] = [];
  for (const fragment of fragments) {
    const result = mergeFragment(content, fragment, context);
    content = result.content;
    actions.push(result.action);
  }
  return { content, actions };
}

function mergeBadgeBlock(
  lines: Line[],
  texts: string[],
): { lines: Line[]; action: MergeAction } {
  const eol = detectEol(lines);
  const located = locateBadgeBlock(lines);

  if (located.status === "found") {
    const { start, end } = located.range;
    return { lines: spliceLines(lines, start, end - start, texts, eol), action: "updated shields" };
  }

  const { anchor } = located;
  return {
    lines: insertBlock(lines, anchor.line, texts, eol),
    action: anchor.kind === "after-title" ? "added shields after title" : "added shields at start",
  };
}

function mergeInstallSection(
  lines: Line[],
  texts: string[],
  context: MergeContext,
): { lines: Line[]; action: MergeAction } {
  const located = locateInstallSection(lines);
  if (located.status === "found") return { lines, action: "kept existing installation section" };
  if (!isInstallApplicable(context.status)) return { lines, action: "skipped installation" };

  return {
    lines: insertBlock(lines, located.anchor.line, texts, detectEol(lines)),
    action: "added installation section",
  };
}

// A fragment the locator cannot find again would be inserted on every run
function validateFragment(fragment: Fragment, texts: string[]): void {
  if (texts.length === 0) {
    throw new InvalidFragmentError(fragment.kind, "fragment is empty");
  }

  if (fragment.kind === "badge-block") {
    const stray = texts.find((text) => !isBadgeLine({ text, eol: "" }));
    if (stray !== undefined) {
      throw new InvalidFragmentError(fragment.kind, `not a badge line: ${JSON.stringify(stray)}`);
    }
    return;
  }

  if (!isInstallHeading({ text: texts[0], eol: "" })) {
    throw new InvalidFragmentError(
      fragment.kind,
      `must start with an installation heading, got ${JSON.stringify(texts[0])}`,
    );
  }
}
