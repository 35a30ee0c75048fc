// src/scan-remote.ts
import { EnumerationError, errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { joinRemote } from "./path-rel.js";
import type { RemoteListEntry, RemoteSession } from "./remote-session.js";

export interface RemoteFile {
  kind: "file";
  name: string;
  size: number;
}

export interface RemoteDir {
  kind: "dir";
  name: string;
  children: RemoteNode[];
}

export type RemoteNode = RemoteFile | RemoteDir;

export function remoteFile(name: string, size: number): RemoteFile {
  return { kind: "file", name, size };
}

export function remoteDir(name: string, children: RemoteNode[] = []): RemoteDir {
  return { kind: "dir", name, children };
}

/**
 * Lists the whole tree under `remoteRoot`, one `list` call per directory.
 * The returned root node is nameless; its children are the root's entries.
 *
 * Any failed listing aborts the scan with an EnumerationError.
 */
export async function scanRemote(
  session: RemoteSession,
  remoteRoot: string,
  { logger = new NullLogger() }: { logger?: Logger } = {},
): Promise<RemoteDir> {
  const root = remoteDir("");
  const stack: { node: RemoteDir; path: string }[] = [
    { node: root, path: remoteRoot },
  ];
  let listings = 0;

  for (let next = stack.pop(); next; next = stack.pop()) {
    const { node, path } = next;
    let rows: RemoteListEntry[];
    try {
      rows = await session.list(path);
    } catch (err) {
      throw new EnumerationError(
        `failed to list remote directory ${path}: ${errorMessage(err)}`,
        path,
        { cause: err },
      );
    }
    listings += 1;

    const subdirs: { node: RemoteDir; path: string }[] = [];
    for (const row of rows) {
      if (row.name === "." || row.name === ".." || !row.name) continue;
      if (row.type === "file") {
        node.children.push(remoteFile(row.name, row.size));
      } else if (row.type === "dir") {
        const child = remoteDir(row.name);
        node.children.push(child);
        subdirs.push({ node: child, path: joinRemote(path, row.name) });
      } else {
        logger.debug("ignoring remote entry of unknown type", {
          path: joinRemote(path, row.name),
        });
      }
    }
    // walk siblings in listing order
    for (let i = subdirs.length - 1; i >= 0; i--) {
      stack.push(subdirs[i]);
    }
  }

  logger.debug("remote scan complete", { root: remoteRoot, listings });
  return root;
}

export function isEmptyTree(root: RemoteDir): boolean {
  return root.children.length === 0;
}
