// src/index.ts — Library API

export type {
  Manifest,
  KnownStatus,
  Fragment,
  FragmentKind,
  Stage,
  LineRange,
  Anchor,
  LocateResult,
  MergeAction,
  MergeResult,
  ChangeKind,
  ChangeRecord,
  RunMode,
  Presentation,
  Warning,
} from "./types.js";

export {
  KNOWN_STATUSES,
  INSTALL_SUPPRESSED_STATUSES,
  STAGES,
  MissingInputError,
  MalformedInputError,
  IOFailureError,
  InvalidFragmentError,
  ENGINE_VERSION,
} from "./types.js";

export { locate, BADGE_NAMES, INSTALL_ANCHOR_SECTIONS } from "./section-locator.js";
export { merge, mergeFragment, mergeAll, isInstallApplicable } from "./merge-engine.js";
export type { MergeContext } from "./merge-engine.js";
export { diff, diffText, diffJson, DEFAULT_CONTEXT_LINES } from "./diff-engine.js";
export type { DiffResult, DiffOptions } from "./diff-engine.js";
export { classifyChange, shouldPersist, formatChangeReport } from "./change-reporter.js";
export { formatDiffOutput, colorizeDiff, colorAllowed } from "./presentation.js";
export { parseManifest, loadManifest } from "./manifest.js";
export { generateShields, renderBadgeFragment, formatShieldsDisplayBlock } from "./fragments/shields.js";
export { generateInstallSection, renderInstallFragment } from "./fragments/install.js";
export { createReadme } from "./fragments/readme-template.js";
export { FsDocumentStore } from "./document-store.js";
export type { DocumentStore } from "./document-store.js";
export { processDirectory, runBatch, buildReadme, renderFragments } from "./pipeline.js";
export type { ProcessOptions, DirectoryResult, BatchResult, Sink } from "./pipeline.js";
