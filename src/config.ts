// src/config.ts — Config Resolver
// defaults ← config file ← CLI flags. Color is decided here, once.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import { z } from "zod";
import { colorAllowed } from "./presentation.js";
import { STAGES, type Presentation, type Stage, type Warning } from "./types.js";

export const CONFIG_FILENAME = "readme-forge.config.json";
export const PACKAGE_JSON_KEY = "readmeForge";

export type Command = "sync" | "shields";

export interface ParsedArgs {
  command: Command;
  directories: string[];
  dryRun: boolean;
  verbose: boolean;
  quiet: boolean;
  help: boolean;
  version: boolean;
  stages?: string;
  manifestPath?: string;
  maxDiffLines?: number;
  color?: boolean;
  config?: string;
}

export interface ResolvedConfig {
  directories: string[];
  dryRun: boolean;
  verbose: boolean;
  stages: Stage[];
  manifestName: string;
  readmeName: string;
  manifestPath?: string;
  presentation: Presentation;
}

export const FileConfigSchema = z.object({
  manifestName: z.string().min(1).optional(),
  readmeName: z.string().min(1).optional(),
  stages: z.array(z.string()).optional(),
  maxDiffLines: z.number().int().positive().optional(),
  color: z.boolean().optional(),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

const DEFAULTS = {
  manifestName: "manifest.json",
  readmeName: "README.md",
} as const;

export interface ResolveContext {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Resolve config from CLI args, config file, environment and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  context: ResolveContext = {},
): ResolvedConfig {
  const env = context.env ?? process.env;
  const cwd = context.cwd ?? process.cwd();
  const fileConfig = loadConfigFile(args.config, cwd, warnings) ?? {};

  const stageList = args.stages !== undefined ? splitList(args.stages) : fileConfig.stages;

  return {
    directories: (args.directories.length > 0 ? args.directories : ["."]).map((d) => resolve(cwd, d)),
    dryRun: args.dryRun,
    verbose: args.verbose,
    stages: stageList ? resolveStages(stageList, warnings) : [...STAGES],
    manifestName: fileConfig.manifestName ?? DEFAULTS.manifestName,
    readmeName: fileConfig.readmeName ?? DEFAULTS.readmeName,
    manifestPath: args.manifestPath ? resolve(cwd, args.manifestPath) : undefined,
    presentation: {
      color: colorAllowed(env) && (args.color ?? fileConfig.color ?? true),
      maxDiffLines: args.maxDiffLines ?? fileConfig.maxDiffLines,
    },
  };
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

function isStage(value: string): value is Stage {
  return STAGES.some((s) => s === value);
}

/**
 * Keep known stage names in run order; warn about the rest.
 * An empty selection falls back to every stage.
 */
export function resolveStages(names: readonly string[], warnings: Warning[]): Stage[] {
  for (const name of names) {
    if (!isStage(name)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Unknown stage "${name}" ignored. Known stages: ${STAGES.join(", ")}`,
      });
    }
  }

  const selected = STAGES.filter((s) => names.includes(s));
  if (selected.length > 0) return selected;

  warnings.push({ level: "warn", module: "config", message: "No valid stages selected, running all stages" });
  return [...STAGES];
}

function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
  warnings: Warning[],
): FileConfig | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({ level: "warn", module: "config", message: `Config file not found: ${configPath}` });
      return null;
    }
    return parseConfigFile(absPath, warnings, (json) => json);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings, (json) => json);
  }

  // readmeForge key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    return parseConfigFile(pkgJson, warnings, (json) => readKey(json, PACKAGE_JSON_KEY));
  }

  return null;
}

function readKey(json: unknown, key: string): unknown {
  if (typeof json !== "object" || json === null) return undefined;
  return Object.entries(json).find(([k]) => k === key)?.[1];
}

function parseConfigFile(
  filePath: string,
  warnings: Warning[],
  select: (json: unknown) => unknown,
): FileConfig | null {
  let selected: unknown;
  try {
    selected = select(JSON.parse(readFileSync(filePath, "utf-8")));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "warn", module: "config", message: `Failed to parse config file ${filePath}: ${msg}` });
    return null;
  }
  if (selected === undefined) return null;

  const parsed = FileConfigSchema.safeParse(selected);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    warnings.push({ level: "warn", module: "config", message: `Invalid config in ${filePath}: ${issues}`, file: filePath });
    return null;
  }
  return parsed.data;
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["dry-run", "quiet", "verbose", "help", "version", "color"],
    string: ["config", "stages", "manifest-path", "max-diff-lines"],
  });

  const positional = args._.map(String);
  let command: Command = "sync";
  if (positional[0] === "sync" || positional[0] === "shields") {
    command = positional[0];
    positional.shift();
  }

  const maxDiffLines = optionalString(args["max-diff-lines"]);
  return {
    command,
    directories: positional,
    dryRun: args["dry-run"] === true,
    verbose: args.verbose === true,
    quiet: args.quiet === true,
    help: args.help === true,
    version: args.version === true,
    stages: optionalString(args.stages),
    manifestPath: optionalString(args["manifest-path"]),
    maxDiffLines: maxDiffLines !== undefined ? parsePositiveInt(maxDiffLines) : undefined,
    color: typeof args.color === "boolean" ? args.color : undefined,
    config: optionalString(args.config),
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function parsePositiveInt(value: string): number | undefined {
  const n = Number.parseInt(value, 10);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}
