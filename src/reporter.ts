import { Chalk, type ChalkInstance } from "chalk";
import { assertNever } from "./errors.js";
import type { Entry, EntryKind } from "./types.js";
import { formatBytes, formatPath, formatPercent, padLeft, padRight } from "./utils.js";

export interface ReportOptions {
  /** Truncate displayed paths to this many characters; 0 keeps them whole. */
  pathWidth?: number;
  /** Colour instance; plain text when omitted. */
  color?: ChalkInstance;
}

const KIND_LABELS: Record<EntryKind, string> = {
  directory: "FOLDER",
  file: "FILE",
};

const PLAIN = new Chalk({ level: 0 });

export function formatEntryLine(entry: Entry, parentSize: number, depth: number, options: ReportOptions = {}): string {
  const c = options.color ?? PLAIN;
  const label = padRight(KIND_LABELS[entry.kind], 6);
  const size = padLeft(formatBytes(entry.size), 9);
  const percent = padLeft(formatPercent(entry.size, parentSize), 6);
  const path = "->".repeat(depth) + formatPath(entry.path, options.pathWidth);

  return [
    entry.kind === "directory" ? c.bold.blue(label) : label,
    c.yellow(size),
    c.dim(`[${percent}%]`),
    path,
  ].join(" ");
}

/**
 * Depth-first, pre-order: each directory is followed by all of its
 * descendants before its next sibling. The root is measured against itself.
 */
export function writeReport(root: Entry, write: (line: string) => void, options: ReportOptions = {}): void {
  const visit = (entry: Entry, parentSize: number, depth: number) => {
    write(formatEntryLine(entry, parentSize, depth, options));
    switch (entry.kind) {
      case "file":
        return;
      case "directory":
        for (const child of entry.children) {
          visit(child, entry.size, depth + 1);
        }
        return;
      default:
        assertNever(entry);
    }
  };
  visit(root, root.size, 0);
}

export function renderReport(root: Entry, options: ReportOptions = {}): string[] {
  const lines: string[] = [];
  writeReport(root, (line) => lines.push(line), options);
  return lines;
}
