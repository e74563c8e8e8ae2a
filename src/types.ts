// src/types.ts — Shared types for the README sync engine

// ─── Manifest ────────────────────────────────────────────────────────────────

/**
 * Normalized package manifest. Produced by `parseManifest`; the engine only
 * reads field values, never the file representation.
 */
export interface Manifest {
  name?: string;
  title?: string;
  description?: string;
  version: string;
  /** Lower-cased; "unknown" when the manifest omits it. */
  status: string;
  platforms: string[];
  license?: string;
  github?: string;
  dependencies: Record<string, string>;
  requiresTalonBeta: boolean;
}

export const KNOWN_STATUSES = [
  "stable",
  "preview",
  "experimental",
  "prototype",
  "reference",
  "deprecated",
  "archived",
] as const;

export type KnownStatus = (typeof KNOWN_STATUSES)[number];

/** Statuses for which an installation section is never added. */
export const INSTALL_SUPPRESSED_STATUSES: readonly KnownStatus[] = [
  "reference",
  "archived",
  "deprecated",
];

// ─── Fragments ───────────────────────────────────────────────────────────────

export type FragmentKind = "badge-block" | "install-section";

export interface Fragment {
  kind: FragmentKind;
  text: string;
}

/** Generator stages selectable from the CLI, in the order they run. */
export const STAGES = ["shields", "install"] as const;

export type Stage = (typeof STAGES)[number];

// ─── Section Locator ─────────────────────────────────────────────────────────

/** Half-open line range `[start, end)`. */
export interface LineRange {
  start: number;
  end: number;
}

export type Anchor =
  | { kind: "after-title"; line: number }
  | { kind: "start-of-document"; line: number }
  | { kind: "before-heading"; line: number; heading: string }
  | { kind: "end-of-document"; line: number };

export type LocateResult =
  | { status: "found"; range: LineRange }
  | { status: "absent"; anchor: Anchor };

// ─── Merge Engine ────────────────────────────────────────────────────────────

export type MergeAction =
  | "updated shields"
  | "added shields after title"
  | "added shields at start"
  | "kept existing installation section"
  | "skipped installation"
  | "added installation section";

export interface MergeResult {
  content: string;
  action: MergeAction;
  changed: boolean;
}

// ─── Change Reporter ─────────────────────────────────────────────────────────

export type ChangeKind = "no-change" | "created" | "modified";

export type RunMode = "apply" | "dry-run";

export interface ChangeRecord {
  label: string;
  kind: ChangeKind;
  mode: RunMode;
  /** Unified diff text; empty for "no-change". */
  diff: string;
}

/** Rendering settings decided once at startup and passed down explicitly. */
export interface Presentation {
  color: boolean;
  /** Truncate rendered diffs beyond this many lines. Unset = no truncation. */
  maxDiffLines?: number;
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class MissingInputError extends Error {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = "MissingInputError";
  }
}

export class MalformedInputError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly detail: string,
  ) {
    super(`Malformed ${filePath}: ${detail}`);
    this.name = "MalformedInputError";
  }
}

export class IOFailureError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly operation: "read" | "write",
    cause?: Error,
  ) {
    super(`Failed to ${operation} ${filePath}${cause ? `: ${cause.message}` : ""}`);
    this.name = "IOFailureError";
    if (cause) this.cause = cause;
  }
}

export class InvalidFragmentError extends Error {
  constructor(
    public readonly kind: FragmentKind,
    reason: string,
  ) {
    super(`Invalid ${kind} fragment: ${reason}`);
    this.name = "InvalidFragmentError";
  }
}

export const ENGINE_VERSION = "0.1.0";
