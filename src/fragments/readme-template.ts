// src/fragments/readme-template.ts — README created from scratch
// The result is already in merged form: merging the same fragments into it
// changes nothing.

import { generateShields } from "./shields.js";
import { generateInstallSection } from "./install.js";
import { isInstallApplicable } from "../merge-engine.js";
import type { Manifest, Stage } from "../types.js";

export const DEFAULT_TITLE = "Untitled Package";
export const DEFAULT_DESCRIPTION = "A Talon voice control package.";

export interface ReadmeTemplateOptions {
  stages: readonly Stage[];
  /** The package directory has a preview.png to show. */
  hasPreview: boolean;
}

export function createReadme(manifest: Manifest, options: ReadmeTemplateOptions): string {
  const lines = [`# ${manifest.title ?? manifest.name ?? DEFAULT_TITLE}`, ""];

  if (options.stages.includes("shields")) {
    lines.push(...generateShields(manifest), "");
  }

  lines.push(manifest.description ?? DEFAULT_DESCRIPTION);

  if (options.hasPreview) {
    lines.push("", '<img src="preview.png" alt="preview">');
  }

  if (options.stages.includes("install") && isInstallApplicable(manifest.status)) {
    lines.push("", generateInstallSection(manifest));
  }

  return lines.join("\n") + "\n";
}
