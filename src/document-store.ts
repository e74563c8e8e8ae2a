// src/document-store.ts — Reading and persisting documents
// Writes are all-or-nothing: content goes to a sibling temporary file that is
// renamed over the target, and the temporary file is removed on failure.
// Reads reject bytes that are not UTF-8 rather than replacing them.

import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { IOFailureError, MalformedInputError } from "./types.js";

export interface DocumentStore {
  exists(path: string): boolean;
  /** File content, or undefined when the file does not exist. */
  read(path: string): string | undefined;
  write(path: string, content: string): void;
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export class FsDocumentStore implements DocumentStore {
  exists(path: string): boolean {
    return existsSync(path);
  }

  read(path: string): string | undefined {
    if (!existsSync(path)) return undefined;
    let bytes: Buffer;
    try {
      bytes = readFileSync(path);
    } catch (err: unknown) {
      throw new IOFailureError(path, "read", toError(err));
    }
    try {
      return utf8.decode(bytes);
    } catch {
      throw new MalformedInputError(path, "not valid UTF-8");
    }
  }

  write(path: string, content: string): void {
    const tmpPath = join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
    let committed = false;
    try {
      writeFileSync(tmpPath, content, "utf-8");
      renameSync(tmpPath, path);
      committed = true;
    } catch (err: unknown) {
      throw new IOFailureError(path, "write", toError(err));
    } finally {
      if (!committed) rmSync(tmpPath, { force: true });
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
