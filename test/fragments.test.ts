import { describe, it, expect } from "vitest";
import { generateShields, escapeBadgeText, formatShieldsDisplayBlock, STATUS_COLORS } from "../src/fragments/shields.js";
import { generateInstallSection } from "../src/fragments/install.js";
import { createReadme } from "../src/fragments/readme-template.js";
import { mergeAll } from "../src/merge-engine.js";
import { normalizeManifest } from "../src/manifest.js";
import { renderFragments } from "../src/pipeline.js";

describe("generateShields", () => {
  it("always emits version and status", () => {
    expect(generateShields(normalizeManifest({}))).toEqual([
      "![Version](https://img.shields.io/badge/version-0.0.0-blue)",
      "![Status](https://img.shields.io/badge/status-unknown-lightgrey)",
    ]);
  });

  it("adds platform, license and beta badges in order", () => {
    const manifest = normalizeManifest({
      version: "1.2.0",
      status: "Preview",
      platforms: ["windows", "mac", "linux"],
      license: "MIT",
      requires_talon_beta: true,
    });
    expect(generateShields(manifest)).toEqual([
      "![Version](https://img.shields.io/badge/version-1.2.0-blue)",
      "![Status](https://img.shields.io/badge/status-preview-orange)",
      "![Platform](https://img.shields.io/badge/platform-windows%20%7C%20mac%20%7C%20linux-lightgrey)",
      "![License](https://img.shields.io/badge/license-MIT-blue)",
      "![Talon Beta](https://img.shields.io/badge/talon%20beta-required-red)",
    ]);
  });

  it("accepts either beta key", () => {
    const shields = generateShields(normalizeManifest({ requiresTalonBeta: true }));
    expect(shields[shields.length - 1]).toBe("![Talon Beta](https://img.shields.io/badge/talon%20beta-required-red)");
  });

  it("colors every known status", () => {
    expect(STATUS_COLORS).toEqual({
      stable: "green",
      preview: "orange",
      experimental: "orange",
      prototype: "red",
      reference: "blue",
      deprecated: "red",
      archived: "lightgrey",
    });
  });
});

describe("escapeBadgeText", () => {
  it("doubles dashes and underscores and encodes the rest", () => {
    expect(escapeBadgeText("1.0.0-beta_2")).toBe("1.0.0--beta__2");
    expect(escapeBadgeText("Apache 2.0")).toBe("Apache%202.0");
    expect(escapeBadgeText("x (y)")).toBe("x%20%28y%29");
  });
});

describe("formatShieldsDisplayBlock", () => {
  it("frames the badges", () => {
    const rule = "=".repeat(60);
    expect(formatShieldsDisplayBlock(["A", "B"])).toBe([rule, "Shield Badges (copy to README.md)", rule, "A", "B", rule].join("\n"));
  });
});

describe("generateInstallSection", () => {
  it("lists dependencies, the beta note, platform paths and the clone command", () => {
    const manifest = normalizeManifest({
      platforms: ["windows"],
      github: "https://github.com/example/mouse-tools",
      dependencies: { community: "1.4.0" },
      requiresTalonBeta: true,
    });
    expect(generateInstallSection(manifest)).toBe(
      [
        "## Installation",
        "",
        "### Dependencies",
        "",
        "- **community** (v1.4.0+)",
        "",
        "> Requires [Talon beta](https://talonvoice.com/docs/#beta).",
        "",
        "Clone this repository into your [Talon](https://talonvoice.com/) user directory:",
        "",
        "- Windows: `%APPDATA%\\Talon\\user`",
        "",
        "```sh",
        "git clone https://github.com/example/mouse-tools",
        "```",
      ].join("\n"),
    );
  });

  it("lists every platform when the manifest names none it knows", () => {
    const text = generateInstallSection(normalizeManifest({ platforms: ["amiga"] }));
    expect(text.split("\n").filter((l) => l.startsWith("- "))).toEqual([
      "- Mac: `~/.talon/user`",
      "- Linux: `~/.talon/user`",
      "- Windows: `%APPDATA%\\Talon\\user`",
    ]);
  });
});

describe("createReadme", () => {
  const all = ["shields", "install"] as const;

  it("builds title, badges, description and install section", () => {
    const manifest = normalizeManifest({ name: "mouse", title: "Mouse Tools", description: "Click things.", platforms: ["mac"] });
    expect(createReadme(manifest, { stages: all, hasPreview: false })).toBe(
      [
        "# Mouse Tools",
        "",
        "![Version](https://img.shields.io/badge/version-0.0.0-blue)",
        "![Status](https://img.shields.io/badge/status-unknown-lightgrey)",
        "![Platform](https://img.shields.io/badge/platform-mac-lightgrey)",
        "",
        "Click things.",
        "",
        "## Installation",
        "",
        "Clone this repository into your [Talon](https://talonvoice.com/) user directory:",
        "",
        "- Mac: `~/.talon/user`",
        "",
      ].join("\n"),
    );
  });

  it("falls back to name and default description, and shows the preview", () => {
    const manifest = normalizeManifest({ name: "mouse", status: "archived" });
    expect(createReadme(manifest, { stages: ["install"], hasPreview: true })).toBe(
      ["# mouse", "", "A Talon voice control package.", "", '<img src="preview.png" alt="preview">', ""].join("\n"),
    );
  });

  it("is already in merged form", () => {
    const manifest = normalizeManifest({ title: "Pkg", version: "2.1.0", status: "stable", platforms: ["linux"], requiresTalonBeta: true });
    const created = createReadme(manifest, { stages: all, hasPreview: true });
    expect(mergeAll(created, renderFragments(manifest, all), manifest).content).toBe(created);
  });
});
