#!/usr/bin/env node
// CLI entry point for readme-forge

import { ENGINE_VERSION, STAGES, type Warning } from "../types.js";
import { parseCliArgs, resolveConfig, CONFIG_FILENAME } from "../config.js";
import { runBatch } from "../pipeline.js";
import { runShields } from "./shields.js";

const HELP_TEXT = `
readme-forge v${ENGINE_VERSION}

Usage:
  readme-forge [sync] [dirs...]        Update README badges and install section from the manifest
  readme-forge shields [dirs...]       Refresh existing badges only; print them when a README has none

Arguments:
  dirs                 Package directories (default: current directory)

Options:
  --dry-run            Show what would change without writing anything
  --stages <list>      Comma-separated stages to run: ${STAGES.join(", ")} (default: all)
  --manifest-path      Use this manifest for every directory (e.g. a mock for previews)
  --max-diff-lines <n> Truncate each printed diff after n lines
  --no-color           Disable colored output (also: NO_COLOR, TERM=dumb)
  --config, -c         Path to config file (default: ${CONFIG_FILENAME})
  --quiet, -q          Suppress warnings
  --verbose, -v        Print the actions taken per directory
  --version            Print the version
  --help, -h           Show this help text

Examples:
  readme-forge
  readme-forge ./packages/mouse ./packages/editor --dry-run
  readme-forge --stages shields
`.trim();

const stdout = (line: string): void => {
  process.stdout.write(line + "\n");
};

const stderr = (line: string): void => {
  process.stderr.write(line + "\n");
};

async function main() {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    stdout(HELP_TEXT);
    process.exit(0);
  }

  if (args.version) {
    stdout(ENGINE_VERSION);
    process.exit(0);
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);

  if (!args.quiet) {
    for (const w of warnings) stderr(`[${w.level}] ${w.module}: ${w.message}`);
  }

  if (args.command === "shields") {
    const failed = runShields(config, { stdout, stderr });
    process.exit(failed > 0 ? 1 : 0);
  }

  const result = runBatch(config.directories, { ...config, stdout, stderr });
  process.exit(result.failed > 0 ? 1 : 0);
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Fatal error: ${msg}\n`);
  process.exit(1);
});
