// src/flatten.ts
import { dirEntry, fileEntry, type FlatSet, type PathEntry } from "./path-entry.js";
import type { RemoteDir } from "./scan-remote.js";

function addUnique(out: FlatSet, entry: PathEntry): void {
  if (out.has(entry.relPath)) {
    throw new Error(`remote listing repeats ${entry.relPath}`);
  }
  out.set(entry.relPath, entry);
}

/**
 * Turns a remote tree into the flat form used for local scans.
 *
 * The root contributes nothing, so an empty remote flattens to an empty set.
 * Every other directory is emitted, empty or not: local scans never produce
 * empty directories, which leaves stale empty ones on the remote scheduled
 * for removal.
 */
export function flattenRemote(root: RemoteDir): FlatSet {
  const out: FlatSet = new Map();
  const stack: { node: RemoteDir; prefix: string }[] = [
    { node: root, prefix: "" },
  ];
  for (let next = stack.pop(); next; next = stack.pop()) {
    const { node, prefix } = next;
    for (const child of node.children) {
      const rel = prefix ? `${prefix}/${child.name}` : child.name;
      if (child.kind === "file") {
        addUnique(out, fileEntry(rel, child.size));
      } else {
        addUnique(out, dirEntry(rel));
        if (child.children.length) {
          stack.push({ node: child, prefix: rel });
        }
      }
    }
  }
  return out;
}
