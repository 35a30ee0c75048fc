// src/delta.ts
import {
  SIZE_COMPARATOR,
  byPath,
  comparePaths,
  type EntryComparator,
  type FlatSet,
  type PathEntry,
} from "./path-entry.js";
import { depth } from "./path-rel.js";

export interface Delta {
  // local entries the remote lacks, ascending by path
  add: PathEntry[];
  // remote entries the local tree lacks, every path before its ancestors
  remove: PathEntry[];
}

function difference(
  from: FlatSet,
  other: FlatSet,
  comparator: EntryComparator,
): PathEntry[] {
  const index = new Map<string, PathEntry>();
  for (const entry of other.values()) {
    index.set(comparator.key(entry), entry);
  }
  const out: PathEntry[] = [];
  for (const entry of from.values()) {
    const counterpart = index.get(comparator.key(entry));
    if (!counterpart || !comparator.sameVersion(entry, counterpart)) {
      out.push(entry);
    }
  }
  return out;
}

/**
 * Deepest paths first, so a directory only comes up once everything under
 * it has been handled. Siblings at one depth go in descending path order.
 */
export function sortChildFirst(entries: PathEntry[]): PathEntry[] {
  return entries.sort((a, b) => {
    const da = depth(a.relPath);
    const db = depth(b.relPath);
    if (da !== db) return db - da;
    return comparePaths(b.relPath, a.relPath);
  });
}

export function computeDelta(
  local: FlatSet,
  remote: FlatSet,
  comparator: EntryComparator = SIZE_COMPARATOR,
): Delta {
  const add = difference(local, remote, comparator).sort(byPath);
  const remove = sortChildFirst(difference(remote, local, comparator));
  return { add, remove };
}

export function isDeltaEmpty(delta: Delta): boolean {
  return delta.add.length === 0 && delta.remove.length === 0;
}

export function deltaVolume(entries: readonly PathEntry[]): number {
  let total = 0;
  for (const entry of entries) {
    if (entry.kind === "file") total += entry.size;
  }
  return total;
}
