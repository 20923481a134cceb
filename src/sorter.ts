import type { Entry, EntryKind } from "./types.js";

const KIND_RANK: Record<EntryKind, number> = { directory: 1, file: 0 };

/** Directories first, then larger entries, then path order so equal sizes stay deterministic. */
export function compareEntries(a: Entry, b: Entry): number {
  const byKind = KIND_RANK[b.kind] - KIND_RANK[a.kind];
  if (byKind !== 0) return byKind;
  if (a.size !== b.size) return b.size - a.size;
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

export function sortEntries(entries: readonly Entry[]): Entry[] {
  return [...entries].sort(compareEntries);
}
