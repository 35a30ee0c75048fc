// src/path-entry.ts
import { DIR_SIZE } from "./constants.js";

export type EntryKind = "file" | "dir";

/** One file or directory of a tree, keyed by its path under the sync root. */
export interface PathEntry {
  kind: EntryKind;
  relPath: string;
  // absolute local path; "" for entries that only exist remotely
  sourcePath: string;
  size: number;
}

export type FlatSet = Map<string, PathEntry>;

export function fileEntry(
  relPath: string,
  size: number,
  sourcePath = "",
): PathEntry {
  return { kind: "file", relPath, sourcePath, size };
}

export function dirEntry(relPath: string, sourcePath = ""): PathEntry {
  return { kind: "dir", relPath, sourcePath, size: DIR_SIZE };
}

/**
 * Decides whether two entries describe the same version of a path.
 *
 * `key` groups entries across the two trees; `sameVersion` is only ever
 * called on entries with equal keys.
 */
export interface EntryComparator {
  readonly name: string;
  key(entry: PathEntry): string;
  sameVersion(a: PathEntry, b: PathEntry): boolean;
}

// Size stands in for content: a same-size edit goes unnoticed.
export const SIZE_COMPARATOR: EntryComparator = {
  name: "path+size",
  key: (entry) => entry.relPath,
  sameVersion: (a, b) => a.relPath === b.relPath && a.size === b.size,
};

export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function byPath(a: PathEntry, b: PathEntry): number {
  return comparePaths(a.relPath, b.relPath);
}

export function toFlatSet(entries: Iterable<PathEntry>): FlatSet {
  const out: FlatSet = new Map();
  for (const entry of entries) {
    if (out.has(entry.relPath)) {
      throw new Error(`duplicate path in tree: ${entry.relPath}`);
    }
    out.set(entry.relPath, entry);
  }
  return out;
}

export function sortedEntries(set: FlatSet): PathEntry[] {
  return Array.from(set.values()).sort(byPath);
}
