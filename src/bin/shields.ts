// src/bin/shields.ts — Shields-only update
// A README that already has a badge block gets it refreshed in place.
// Otherwise the badge lines are printed for copying by hand.

import { join, resolve } from "node:path";
import { FsDocumentStore, type DocumentStore } from "../document-store.js";
import { loadManifest } from "../manifest.js";
import { locate } from "../section-locator.js";
import { mergeFragment } from "../merge-engine.js";
import { generateShields, formatShieldsDisplayBlock, renderBadgeFragment } from "../fragments/shields.js";
import type { ResolvedConfig } from "../config.js";
import type { Sink } from "../pipeline.js";

export interface ShieldsOptions {
  store?: DocumentStore;
  stdout: Sink;
  stderr: Sink;
}

/**
 * Returns the number of directories that failed.
 */
export function runShields(config: ResolvedConfig, options: ShieldsOptions): number {
  const store = options.store ?? new FsDocumentStore();
  let failed = 0;

  for (const packageDir of config.directories) {
    const dir = resolve(packageDir);
    try {
      const manifest = loadManifest(store, config.manifestPath ?? join(dir, config.manifestName));
      const readmePath = join(dir, config.readmeName);
      const existing = store.read(readmePath);

      if (existing === undefined || locate(existing, "badge-block").status === "absent") {
        options.stdout(`\nShields for ${dir}:`);
        options.stdout(formatShieldsDisplayBlock(generateShields(manifest)));
        continue;
      }

      const result = mergeFragment(existing, renderBadgeFragment(manifest), manifest);
      if (!result.changed) {
        options.stdout(`Shields up to date in ${readmePath}`);
      } else if (config.dryRun) {
        options.stdout(`Would update shields in ${readmePath}`);
      } else {
        store.write(readmePath, result.content);
        options.stdout(`Updated shields in ${readmePath}`);
      }
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      options.stderr(`[error] shields: ${dir}: ${msg}`);
      failed++;
    }
  }

  return failed;
}
