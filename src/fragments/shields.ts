// src/fragments/shields.ts — Shield badge generation
// Version, status, platform (optional), license (optional) and
// Talon beta (only when required):
//   (version | 1.0.0) (status | stable) (platform | windows | mac)

import { BADGE_URL_PREFIX } from "../section-locator.js";
import type { Fragment, Manifest } from "../types.js";

export const STATUS_COLORS: Record<string, string> = {
  stable: "green",
  preview: "orange",
  experimental: "orange",
  prototype: "red",
  reference: "blue",
  deprecated: "red",
  archived: "lightgrey",
};

const BADGE_BASE = `${BADGE_URL_PREFIX}badge/`;

// " | " between platforms, already encoded
const PLATFORM_SEPARATOR = "%20%7C%20";

/**
 * Escape text for a shields.io static badge path segment.
 * Dashes and underscores are doubled, then the result is URI-encoded.
 * Parentheses are encoded too: a raw ")" would end the markdown link.
 */
export function escapeBadgeText(text: string): string {
  return encodeURIComponent(text.replace(/-/g, "--").replace(/_/g, "__"))
    .replace(/\(/g, "%28")
    .replace(/\)/g, "%29");
}

function badge(name: string, label: string, message: string, color: string): string {
  return `![${name}](${BADGE_BASE}${label}-${message}-${color})`;
}

/**
 * One markdown image line per badge, in a fixed order.
 */
export function generateShields(manifest: Manifest): string[] {
  const shields = [
    badge("Version", "version", escapeBadgeText(manifest.version), "blue"),
    badge("Status", "status", escapeBadgeText(manifest.status), STATUS_COLORS[manifest.status] ?? "lightgrey"),
  ];

  if (manifest.platforms.length > 0) {
    const platforms = manifest.platforms.map(escapeBadgeText).join(PLATFORM_SEPARATOR);
    shields.push(badge("Platform", "platform", platforms, "lightgrey"));
  }

  if (manifest.license) {
    shields.push(badge("License", "license", escapeBadgeText(manifest.license), "blue"));
  }

  if (manifest.requiresTalonBeta) {
    shields.push(badge("Talon Beta", "talon%20beta", "required", "red"));
  }

  return shields;
}

export function renderBadgeFragment(manifest: Manifest): Fragment {
  return { kind: "badge-block", text: generateShields(manifest).join("\n") };
}

/** Copy-paste block printed when badges are shown rather than written. */
export function formatShieldsDisplayBlock(shields: readonly string[]): string {
  const rule = "=".repeat(60);
  return [rule, "Shield Badges (copy to README.md)", rule, ...shields, rule].join("\n");
}
