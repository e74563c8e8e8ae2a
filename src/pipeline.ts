// src/pipeline.ts — Per-directory orchestration
// load manifest → read README → create or merge per stage → diff → report →
// persist (apply mode only). Each directory is isolated: failures are
// reported and counted, never thrown past processDirectory.

import { join, resolve } from "node:path";
import { FsDocumentStore, type DocumentStore } from "./document-store.js";
import { loadManifest } from "./manifest.js";
import { mergeAll } from "./merge-engine.js";
import { classifyChange, formatChangeReport, shouldPersist } from "./change-reporter.js";
import { renderBadgeFragment } from "./fragments/shields.js";
import { renderInstallFragment } from "./fragments/install.js";
import { createReadme } from "./fragments/readme-template.js";
import { dim, statusError } from "./presentation.js";
import {
  IOFailureError,
  MissingInputError,
  type ChangeRecord,
  type Fragment,
  type Manifest,
  type MergeAction,
  type Presentation,
  type Stage,
} from "./types.js";

export type Sink = (line: string) => void;

export interface ProcessOptions {
  dryRun: boolean;
  verbose: boolean;
  stages: readonly Stage[];
  manifestName: string;
  readmeName: string;
  /** Manifest used for every directory instead of `<dir>/<manifestName>`. */
  manifestPath?: string;
  presentation: Presentation;
  store?: DocumentStore;
  stdout?: Sink;
  stderr?: Sink;
}

export interface DirectoryResult {
  dir: string;
  ok: boolean;
  record?: ChangeRecord;
  actions: string[];
  error?: string;
}

export interface BatchResult {
  results: DirectoryResult[];
  succeeded: number;
  failed: number;
}

const PREVIEW_IMAGE = "preview.png";

const defaultStdout: Sink = (line) => process.stdout.write(line + "\n");
const defaultStderr: Sink = (line) => process.stderr.write(line + "\n");

/**
 * Fragments for the selected stages, in stage order.
 */
export function renderFragments(manifest: Manifest, stages: readonly Stage[]): Fragment[] {
  const fragments: Fragment[] = [];
  if (stages.includes("shields")) fragments.push(renderBadgeFragment(manifest));
  if (stages.includes("install")) fragments.push(renderInstallFragment(manifest));
  return fragments;
}

/**
 * Compute the updated README for one package directory without writing it.
 * `existing` is undefined when there is no README yet.
 */
export function buildReadme(
  existing: string | undefined,
  manifest: Manifest,
  stages: readonly Stage[],
  hasPreview: boolean,
): { content: string; actions: string[] } {
  if (existing === undefined) {
    return { content: createReadme(manifest, { stages, hasPreview }), actions: ["created README"] };
  }
  const { content, actions } = mergeAll(existing, renderFragments(manifest, stages), manifest);
  return { content, actions: actions.map((a) => describeAction(a, manifest)) };
}

function describeAction(action: MergeAction, manifest: Manifest): string {
  return action === "skipped installation" ? `${action} (status: ${manifest.status})` : action;
}

/**
 * Process one package directory. Never throws.
 */
export function processDirectory(packageDir: string, options: ProcessOptions): DirectoryResult {
  const store = options.store ?? new FsDocumentStore();
  const stdout = options.stdout ?? defaultStdout;
  const stderr = options.stderr ?? defaultStderr;
  const { presentation, readmeName } = options;
  const dir = resolve(packageDir);

  try {
    if (!store.exists(dir)) {
      throw new IOFailureError(dir, "read", new Error("directory not found"));
    }

    const manifestPath = options.manifestPath ?? join(dir, options.manifestName);
    if (!store.exists(manifestPath)) {
      if (options.dryRun) {
        stdout(`${readmeName}: ${dim(`(skipped - ${options.manifestName} doesn't exist yet)`, presentation)}`);
        return { dir, ok: true, actions: [] };
      }
      throw new MissingInputError(manifestPath);
    }

    const manifest = loadManifest(store, manifestPath);
    const readmePath = join(dir, readmeName);
    const existing = store.read(readmePath);
    const hasPreview = store.exists(join(dir, PREVIEW_IMAGE));

    const { content, actions } = buildReadme(existing, manifest, options.stages, hasPreview);
    const record = classifyChange(existing, content, readmeName, options.dryRun ? "dry-run" : "apply");

    if (shouldPersist(record)) {
      store.write(readmePath, content);
    }

    stdout(formatChangeReport(record, presentation));
    if (options.verbose) {
      for (const action of actions) stderr(`[info] readme: ${action}`);
    }
    return { dir, ok: true, record, actions };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    stderr(statusError(`Error processing ${dir}: ${msg}`, presentation));
    return { dir, ok: false, actions: [], error: msg };
  }
}

/**
 * Process directories one after another; one failure does not stop the rest.
 */
export function runBatch(packageDirs: readonly string[], options: ProcessOptions): BatchResult {
  const stdout = options.stdout ?? defaultStdout;
  const store = options.store ?? new FsDocumentStore();

  if (options.dryRun && options.verbose) {
    stdout("DRY RUN MODE - No files will be modified\n");
  }

  const results = packageDirs.map((dir) => processDirectory(dir, { ...options, store }));
  const succeeded = results.filter((r) => r.ok).length;
  const failed = results.length - succeeded;

  if (results.length > 1 && options.verbose) {
    stdout(`\nProcessed ${succeeded}/${results.length} directories successfully`);
  }

  return { results, succeeded, failed };
}
