// src/fragments/install.ts — Installation section text
// Must open with a heading the Section Locator recognizes, and contain no
// "# " lines (e.g. shell comments) that would read as headings.

import type { Fragment, Manifest } from "../types.js";

export const INSTALL_HEADING = "## Installation";

const USER_DIRECTORIES: Record<string, string> = {
  mac: "~/.talon/user",
  linux: "~/.talon/user",
  windows: "%APPDATA%\\Talon\\user",
};

const PLATFORM_LABELS: Record<string, string> = {
  mac: "Mac",
  linux: "Linux",
  windows: "Windows",
};

export function generateInstallSection(manifest: Manifest): string {
  const lines = [INSTALL_HEADING, ""];

  const dependencies = Object.entries(manifest.dependencies);
  if (dependencies.length > 0) {
    lines.push("### Dependencies", "");
    for (const [name, version] of dependencies) {
      lines.push(`- **${name}** (v${version}+)`);
    }
    lines.push("");
  }

  if (manifest.requiresTalonBeta) {
    lines.push("> Requires [Talon beta](https://talonvoice.com/docs/#beta).", "");
  }

  lines.push("Clone this repository into your [Talon](https://talonvoice.com/) user directory:", "");
  for (const platform of userDirectoryPlatforms(manifest.platforms)) {
    lines.push(`- ${PLATFORM_LABELS[platform]}: \`${USER_DIRECTORIES[platform]}\``);
  }

  if (manifest.github) {
    lines.push("", "```sh", `git clone ${manifest.github}`, "```");
  }

  return lines.join("\n");
}

export function renderInstallFragment(manifest: Manifest): Fragment {
  return { kind: "install-section", text: generateInstallSection(manifest) };
}

// Known platforms once each, in manifest order; all of them when none are listed
function userDirectoryPlatforms(platforms: readonly string[]): string[] {
  const known = platforms.map((p) => p.toLowerCase()).filter((p) => p in USER_DIRECTORIES);
  const unique = [...new Set(known)];
  return unique.length > 0 ? unique : ["mac", "linux", "windows"];
}
