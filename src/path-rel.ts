// src/path-rel.ts
import path from "node:path";

// Relative paths are always posix, whatever the host separator.
export function toRel(abs: string, root: string): string {
  const rel = path.relative(root, abs);
  if (!rel) return "";
  return rel.split(path.sep).join("/");
}

export function toAbs(rel: string, root: string): string {
  return rel ? path.join(root, ...rel.split("/")) : root;
}

/** Joins a relative path onto a remote root without doubling slashes. */
export function joinRemote(root: string, rel: string): string {
  if (!rel) return root;
  if (!root) return rel;
  return root.endsWith("/") ? `${root}${rel}` : `${root}/${rel}`;
}

export function depth(rel: string): number {
  return rel === "" ? 0 : rel.split("/").length;
}

/** "a/b/c.txt" -> ["a", "a/b"] */
export function ancestors(rel: string): string[] {
  const parts = rel.split("/");
  const out: string[] = [];
  for (let i = 1; i < parts.length; i++) {
    out.push(parts.slice(0, i).join("/"));
  }
  return out;
}
