/**
 * Result tree types, produced by the aggregator and read by the reporter and the TUI.
 * Every entry is frozen once its size and children are resolved.
 */

// ─── Entries ─────────────────────────────────────────────────────────

export interface FileEntry {
  readonly kind: "file";
  readonly path: string;
  readonly size: number;
}

export interface DirectoryEntry {
  readonly kind: "directory";
  readonly path: string;
  readonly size: number;
  readonly children: readonly Entry[];
}

export type Entry = FileEntry | DirectoryEntry;

export type EntryKind = Entry["kind"];

// ─── Scan events ─────────────────────────────────────────────────────

export type ScanWarningKind = "scan" | "entry" | "metadata";

export interface ScanWarning {
  kind: ScanWarningKind;
  path: string;
  code: string;
  message: string;
}

export interface ScanProgress {
  /** Directories found so far, including the root. */
  discovered: number;
  /** Directories whose size and children are final. */
  resolved: number;
  files: number;
  bytes: number;
}
