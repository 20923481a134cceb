import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import { RootUnreadableError, errorCode, errorMessage } from "./errors.js";
import { createLimiter } from "./limiter.js";
import { scanDirectory, type DirectoryListing, type ScanContext } from "./scanner.js";
import { sortEntries } from "./sorter.js";
import type { DirectoryEntry, Entry, FileEntry, ScanProgress, ScanWarning } from "./types.js";

export const DEFAULT_CONCURRENCY = 64;

export interface ScanOptions {
  /** Max in-flight filesystem calls; 0 means unbounded. */
  concurrency?: number;
  /** Reject with RootUnreadableError instead of reporting an empty root directory. */
  failOnUnreadableRoot?: boolean;
  onWarning?: (warning: ScanWarning) => void;
  onProgress?: (progress: ScanProgress) => void;
}

interface AggregateContext extends ScanContext {
  progress: ScanProgress;
  report: () => void;
}

function createContext(options: ScanOptions): AggregateContext {
  const progress: ScanProgress = { discovered: 0, resolved: 0, files: 0, bytes: 0 };
  return {
    limit: createLimiter(options.concurrency ?? DEFAULT_CONCURRENCY),
    warn: (warning) => options.onWarning?.(warning),
    progress,
    report: () => options.onProgress?.({ ...progress }),
  };
}

/**
 * Resolves `path` into a finished entry: a file from its metadata, a directory
 * by recursive fan-out over its subdirectories.
 *
 * Failures below the root only shrink the affected node to 0 and are reported
 * through `onWarning`. An unreadable root is reported as an empty directory,
 * or rejects with RootUnreadableError when `failOnUnreadableRoot` is set.
 */
export async function resolveEntry(path: string, options: ScanOptions = {}): Promise<Entry> {
  const context = createContext(options);
  let info: Stats;
  try {
    info = await context.limit(() => stat(path));
  } catch (error) {
    if (options.failOnUnreadableRoot) throw new RootUnreadableError(path, error);
    context.warn(toWarning("scan", path, error));
    return freezeDirectory(path, []);
  }
  if (!info.isDirectory()) {
    return freezeFile({ kind: "file", path, size: info.size });
  }

  context.progress.discovered++;
  const listing = await scanDirectory(path, context);
  if (!listing.ok && options.failOnUnreadableRoot) {
    throw new RootUnreadableError(path, listing.error);
  }
  return finishDirectory(path, listing, context);
}

async function resolveDirectory(path: string, context: AggregateContext): Promise<DirectoryEntry> {
  return finishDirectory(path, await scanDirectory(path, context), context);
}

async function finishDirectory(
  path: string,
  listing: DirectoryListing,
  context: AggregateContext,
): Promise<DirectoryEntry> {
  if (!listing.ok) {
    context.warn(toWarning("scan", path, listing.error));
    context.progress.resolved++;
    context.report();
    return freezeDirectory(path, []);
  }

  for (const file of listing.files) {
    context.progress.files++;
    context.progress.bytes += file.size;
  }
  context.progress.discovered += listing.directories.length;
  context.report();

  // One unit of work per subdirectory; the parent only finishes once all of them have.
  const subdirectories = await Promise.all(listing.directories.map((dir) => resolveDirectory(dir, context)));

  const children: Entry[] = [...subdirectories, ...listing.files.map(freezeFile)];
  context.progress.resolved++;
  context.report();
  return freezeDirectory(path, children);
}

function toWarning(kind: ScanWarning["kind"], path: string, error: unknown): ScanWarning {
  return { kind, path, code: errorCode(error), message: errorMessage(error) };
}

function freezeFile(file: FileEntry): FileEntry {
  return Object.freeze({ kind: "file", path: file.path, size: file.size });
}

function freezeDirectory(path: string, children: Entry[]): DirectoryEntry {
  const sorted = Object.freeze(sortEntries(children));
  const size = sorted.reduce((sum, child) => sum + child.size, 0);
  return Object.freeze({ kind: "directory", path, size, children: sorted });
}
