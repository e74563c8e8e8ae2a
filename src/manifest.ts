// src/manifest.ts — Manifest loading and normalization

import { z } from "zod";
import type { DocumentStore } from "./document-store.js";
import { MalformedInputError, MissingInputError, type Manifest } from "./types.js";

export const DEFAULT_VERSION = "0.0.0";

export const ManifestSchema = z
  .object({
    name: z.string().optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    version: z.string().optional(),
    status: z.string().optional(),
    platforms: z.array(z.string()).optional(),
    license: z.string().optional(),
    github: z.string().optional(),
    dependencies: z.record(z.string(), z.string()).optional(),
    requires_talon_beta: z.boolean().optional(),
    requiresTalonBeta: z.boolean().optional(),
  })
  .passthrough();

export type RawManifest = z.infer<typeof ManifestSchema>;

/**
 * Parse and validate manifest JSON.
 * Throws MalformedInputError for invalid JSON or wrongly typed fields.
 */
export function parseManifest(text: string, filePath: string): Manifest {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(filePath, msg);
  }

  const parsed = ManifestSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new MalformedInputError(filePath, issues);
  }
  return normalizeManifest(parsed.data);
}

export function normalizeManifest(raw: RawManifest): Manifest {
  return {
    name: raw.name,
    title: raw.title,
    description: raw.description,
    version: raw.version ?? DEFAULT_VERSION,
    status: (raw.status ?? "unknown").toLowerCase(),
    platforms: raw.platforms ?? [],
    license: raw.license,
    github: raw.github,
    dependencies: raw.dependencies ?? {},
    requiresTalonBeta: (raw.requires_talon_beta ?? false) || (raw.requiresTalonBeta ?? false),
  };
}

/**
 * Read and parse the manifest at `filePath`.
 */
export function loadManifest(store: DocumentStore, filePath: string): Manifest {
  const text = store.read(filePath);
  if (text === undefined) throw new MissingInputError(filePath);
  return parseManifest(text, filePath);
}
