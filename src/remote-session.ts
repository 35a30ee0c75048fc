// src/remote-session.ts
import type { Readable } from "node:stream";

export type RemoteEntryType = "file" | "dir" | "other";

/** One row of a single-level directory listing (MLSD style). */
export interface RemoteListEntry {
  name: string;
  type: RemoteEntryType;
  size: number;
}

/**
 * What the sync engine needs from the remote side. Calls are issued one at a
 * time; an implementation never sees two in flight.
 */
export interface RemoteSession {
  list(path: string): Promise<RemoteListEntry[]>;
  deleteFile(path: string): Promise<void>;
  /** Only ever called on a directory whose contents were already removed. */
  removeDir(path: string): Promise<void>;
  /** Succeeds when the directory already exists. */
  makeDir(path: string): Promise<void>;
  upload(path: string, source: Readable): Promise<void>;
  close(): Promise<void>;
}

export interface RemoteTarget {
  host: string;
  port: number;
  user: string;
  password: string;
  secure: boolean;
  timeoutMs: number;
}

export type RemoteConnector = (target: RemoteTarget) => Promise<RemoteSession>;
