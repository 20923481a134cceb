import type { Dirent } from "node:fs";
import { readdir, lstat } from "node:fs/promises";
import { join } from "node:path";
import { errorCode, errorMessage } from "./errors.js";
import type { Limiter } from "./limiter.js";
import type { FileEntry, ScanWarning } from "./types.js";

export interface ScanContext {
  limit: Limiter;
  warn: (warning: ScanWarning) => void;
}

export type DirectoryListing =
  | { ok: true; files: FileEntry[]; directories: string[] }
  | { ok: false; error: unknown };

/**
 * Lists the immediate children of `dirPath`. Subdirectories come back as paths
 * for the caller to resolve; every other entry is stat'ed here (without
 * following symlinks) and returned as a finished file entry.
 *
 * Only a failure to list the directory itself yields `ok: false`; per-entry
 * failures are reported through `context.warn` and the listing continues.
 */
export async function scanDirectory(dirPath: string, context: ScanContext): Promise<DirectoryListing> {
  let dirents: Dirent[];
  try {
    dirents = await context.limit(() => readdir(dirPath, { withFileTypes: true }));
  } catch (error) {
    return { ok: false, error };
  }

  const directories: string[] = [];
  const pending: Promise<FileEntry | null>[] = [];

  for (const dirent of dirents) {
    const childPath = join(dirPath, dirent.name);
    if (dirent.isDirectory()) {
      directories.push(childPath);
    } else {
      pending.push(statFile(childPath, context));
    }
  }

  const files: FileEntry[] = [];
  for (const file of await Promise.all(pending)) {
    if (file) files.push(file);
  }

  return { ok: true, files, directories };
}

async function statFile(path: string, context: ScanContext): Promise<FileEntry | null> {
  try {
    const info = await context.limit(() => lstat(path));
    return { kind: "file", path, size: info.size };
  } catch (error) {
    const code = errorCode(error);
    // Removed between readdir and lstat: nothing left to report.
    if (code === "ENOENT") {
      context.warn({ kind: "entry", path, code, message: errorMessage(error) });
      return null;
    }
    context.warn({ kind: "metadata", path, code, message: errorMessage(error) });
    return { kind: "file", path, size: 0 };
  }
}
