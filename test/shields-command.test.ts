import { describe, it, expect } from "vitest";
import { runShields } from "../src/bin/shields.js";
import type { ResolvedConfig } from "../src/config.js";
import { MemoryDocumentStore } from "./helpers/memory-store.js";

function config(directories: string[], dryRun = false): ResolvedConfig {
  return {
    directories,
    dryRun,
    verbose: false,
    stages: ["shields", "install"],
    manifestName: "manifest.json",
    readmeName: "README.md",
    presentation: { color: false },
  };
}

describe("runShields", () => {
  it("prints the badge block per directory and counts failures", () => {
    const store = new MemoryDocumentStore({ "/pkgs/a/manifest.json": JSON.stringify({ version: "1.0.0", status: "stable" }) });
    const out: string[] = [];
    const err: string[] = [];

    const failed = runShields(config(["/pkgs/a", "/pkgs/b"]), {
      store,
      stdout: (l) => out.push(l),
      stderr: (l) => err.push(l),
    });

    const rule = "=".repeat(60);
    expect(failed).toBe(1);
    expect(out).toEqual([
      "\nShields for /pkgs/a:",
      [
        rule,
        "Shield Badges (copy to README.md)",
        rule,
        "![Version](https://img.shields.io/badge/version-1.0.0-blue)",
        "![Status](https://img.shields.io/badge/status-stable-green)",
        rule,
      ].join("\n"),
    ]);
    expect(err).toEqual(["[error] shields: /pkgs/b: File not found: /pkgs/b/manifest.json"]);
    expect(store.writes).toEqual([]);
  });

  describe("with a badge block already in the README", () => {
    const readme = ["# A", "", "![Version](https://img.shields.io/badge/version-0.9.0-blue)", "", "Prose.", ""].join("\n");

    function store() {
      return new MemoryDocumentStore({
        "/pkgs/a/manifest.json": JSON.stringify({ version: "1.0.0", status: "stable" }),
        "/pkgs/a/README.md": readme,
      });
    }

    it("refreshes the badges in place", () => {
      const s = store();
      const out: string[] = [];

      const failed = runShields(config(["/pkgs/a"]), { store: s, stdout: (l) => out.push(l), stderr: () => {} });

      expect(failed).toBe(0);
      expect(out).toEqual(["Updated shields in /pkgs/a/README.md"]);
      expect(s.files.get("/pkgs/a/README.md")).toBe(
        [
          "# A",
          "",
          "![Version](https://img.shields.io/badge/version-1.0.0-blue)",
          "![Status](https://img.shields.io/badge/status-stable-green)",
          "",
          "Prose.",
          "",
        ].join("\n"),
      );
    });

    it("only reports the update in dry-run mode", () => {
      const s = store();
      const out: string[] = [];

      runShields(config(["/pkgs/a"], true), { store: s, stdout: (l) => out.push(l), stderr: () => {} });

      expect(out).toEqual(["Would update shields in /pkgs/a/README.md"]);
      expect(s.writes).toEqual([]);
    });

    it("leaves current badges alone", () => {
      const s = store();
      runShields(config(["/pkgs/a"]), { store: s, stdout: () => {}, stderr: () => {} });
      const out: string[] = [];

      runShields(config(["/pkgs/a"]), { store: s, stdout: (l) => out.push(l), stderr: () => {} });

      expect(out).toEqual(["Shields up to date in /pkgs/a/README.md"]);
      expect(s.writes).toHaveLength(1);
    });
  });
});
