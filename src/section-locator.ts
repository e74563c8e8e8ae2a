// src/section-locator.ts — Section Locator
// Finds where a fragment kind lives in a document, or where it should go.
// Works on line indices: every line is classified as heading, badge marker,
// or other; no markdown structure beyond heading lines is recognized.

import { splitLines, isBlank, parseHeading, type Line } from "./document.js";
import type { Anchor, FragmentKind, LocateResult } from "./types.js";

/** Badge names that make up a badge block, in generation order. */
export const BADGE_NAMES = ["Version", "Status", "Platform", "License", "Talon Beta"] as const;

export const BADGE_URL_PREFIX = "https://img.shields.io/";

/** Well-known sections an installation section is placed in front of. */
export const INSTALL_ANCHOR_SECTIONS = ["Usage", "Features", "License", "Contributing", "API"] as const;

const escapeRegExp = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const BADGE_MARKER = `!\\[(?:${BADGE_NAMES.map(escapeRegExp).join("|")})\\]\\(${escapeRegExp(BADGE_URL_PREFIX)}[^)\\s]*\\)`;

// One or more markers and nothing else on the line
const BADGE_LINE_PATTERN = new RegExp(`^\\s*(?:${BADGE_MARKER}\\s*)+$`);

const INSTALL_HEADING_PATTERN = /\b(?:installation|install|setup)\b/i;

const ANCHOR_HEADING_PATTERN = new RegExp(`^(?:${INSTALL_ANCHOR_SECTIONS.join("|")})$`, "i");

export function isBadgeLine(line: Line): boolean {
  return BADGE_LINE_PATTERN.test(line.text);
}

export function isInstallHeading(line: Line): boolean {
  const heading = parseHeading(line.text);
  return heading !== undefined && INSTALL_HEADING_PATTERN.test(heading.text);
}

/** Index of the first level-1 heading with text, or -1. */
export function findTitleLine(lines: readonly Line[]): number {
  return lines.findIndex((l) => {
    const heading = parseHeading(l.text);
    return heading !== undefined && heading.level === 1 && heading.text !== "";
  });
}

/**
 * Locate a fragment kind in a document.
 */
export function locate(document: string, kind: FragmentKind): LocateResult {
  return locateInLines(splitLines(document), kind);
}

export function locateInLines(lines: readonly Line[], kind: FragmentKind): LocateResult {
  return kind === "badge-block" ? locateBadgeBlock(lines) : locateInstallSection(lines);
}

/**
 * The first maximal run of badge lines, blank lines between them included.
 * Trailing blank lines after the last badge are not part of the block.
 */
export function locateBadgeBlock(lines: readonly Line[]): LocateResult {
  const start = lines.findIndex(isBadgeLine);
  if (start === -1) return { status: "absent", anchor: badgeAnchor(lines) };

  let last = start;
  for (let i = start + 1; i < lines.length; i++) {
    if (isBlank(lines[i])) continue;
    if (!isBadgeLine(lines[i])) break;
    last = i;
  }
  return { status: "found", range: { start, end: last + 1 } };
}

function badgeAnchor(lines: readonly Line[]): Anchor {
  const title = findTitleLine(lines);
  if (title === -1) return { kind: "start-of-document", line: 0 };
  return { kind: "after-title", line: title + 1 };
}

/**
 * An installation section is any heading (levels 1–6) naming
 * Installation, Install or Setup as a whole word. The found range runs to
 * the next heading of the same or a higher level.
 */
export function locateInstallSection(lines: readonly Line[]): LocateResult {
  const start = lines.findIndex(isInstallHeading);
  if (start === -1) return { status: "absent", anchor: installAnchor(lines) };
  return { status: "found", range: { start, end: sectionEnd(lines, start) } };
}

function installAnchor(lines: readonly Line[]): Anchor {
  for (let i = 0; i < lines.length; i++) {
    const heading = parseHeading(lines[i].text);
    if (heading && ANCHOR_HEADING_PATTERN.test(heading.text)) {
      return { kind: "before-heading", line: i, heading: heading.text };
    }
  }
  return { kind: "end-of-document", line: lines.length };
}

function sectionEnd(lines: readonly Line[], start: number): number {
  const level = parseHeading(lines[start].text)?.level ?? 1;
  for (let i = start + 1; i < lines.length; i++) {
    const heading = parseHeading(lines[i].text);
    if (heading && heading.level <= level) return i;
  }
  return lines.length;
}
