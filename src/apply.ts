// src/apply.ts
import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { EMPTY_FILE_WEIGHT } from "./constants.js";
import type { Delta } from "./delta.js";
import { ApplyError, errorMessage } from "./errors.js";
import { fmtMegabytes, shortenPath } from "./format.js";
import { NullLogger, type Logger } from "./logger.js";
import type { PathEntry } from "./path-entry.js";
import { ancestors, joinRemote, toAbs } from "./path-rel.js";
import type { RemoteSession } from "./remote-session.js";

export interface ApplyOptions {
  localRoot: string;
  remoteRoot: string;
  logger?: Logger;
  dryRun?: boolean;
  openSource?: (absPath: string) => Readable;
}

export interface ApplyResult {
  deleted: number;
  uploaded: number;
  bytesTransferred: number;
}

/** Bytes an upload counts for; never zero. */
export function uploadWeight(entry: PathEntry): number {
  return entry.size > 0 ? entry.size : EMPTY_FILE_WEIGHT;
}

/**
 * Removes `remove` in the given order. The first failure ends the phase;
 * earlier deletions stay done.
 */
export async function applyDeletes(
  session: RemoteSession,
  remove: readonly PathEntry[],
  { remoteRoot, logger = new NullLogger(), dryRun = false }: ApplyOptions,
): Promise<number> {
  if (remove.length) logger.info("Removing files/directories from target...");
  let deleted = 0;
  for (const entry of remove) {
    const target = joinRemote(remoteRoot, entry.relPath);
    if (dryRun) {
      logger.info(`Would delete ${shortenPath(target)}`);
      deleted += 1;
      continue;
    }
    logger.info(`Deleting ${shortenPath(target)}...`);
    try {
      if (entry.kind === "dir") {
        await session.removeDir(target);
      } else {
        await session.deleteFile(target);
      }
    } catch (err) {
      throw new ApplyError(
        `failed to remove ${target}: ${errorMessage(err)}`,
        "delete",
        entry.relPath,
        { cause: err },
      );
    }
    deleted += 1;
  }
  return deleted;
}

/**
 * Uploads every file of `add`, creating missing parent directories on the
 * way. Directory entries need no work of their own.
 */
export async function applyAdds(
  session: RemoteSession,
  add: readonly PathEntry[],
  {
    localRoot,
    remoteRoot,
    logger = new NullLogger(),
    dryRun = false,
    openSource = (absPath) => createReadStream(absPath),
  }: ApplyOptions,
): Promise<{ uploaded: number; bytesTransferred: number }> {
  if (add.length) logger.info("Syncing to target...");
  const ensured = new Set<string>();
  let uploaded = 0;
  let bytesTransferred = 0;

  for (const entry of add) {
    if (entry.kind === "dir") continue;
    const target = joinRemote(remoteRoot, entry.relPath);
    const size = fmtMegabytes(entry.size);
    if (dryRun) {
      logger.info(`Would upload ${shortenPath(entry.relPath)} (${size})`);
      uploaded += 1;
      bytesTransferred += uploadWeight(entry);
      continue;
    }

    for (const dir of ancestors(entry.relPath)) {
      if (ensured.has(dir)) continue;
      const dirTarget = joinRemote(remoteRoot, dir);
      logger.debug(`Creating dir "${dirTarget}"`);
      try {
        await session.makeDir(dirTarget);
      } catch (err) {
        throw new ApplyError(
          `failed to create directory ${dirTarget}: ${errorMessage(err)}`,
          "add",
          dir,
          { cause: err },
        );
      }
      ensured.add(dir);
    }

    logger.info(`Uploading ${shortenPath(entry.relPath)} (${size})...`);
    const source = openSource(entry.sourcePath || toAbs(entry.relPath, localRoot));
    try {
      await session.upload(target, source);
    } catch (err) {
      throw new ApplyError(
        `failed to upload ${entry.relPath}: ${errorMessage(err)}`,
        "add",
        entry.relPath,
        { cause: err },
      );
    } finally {
      source.destroy();
    }
    uploaded += 1;
    bytesTransferred += uploadWeight(entry);
  }
  return { uploaded, bytesTransferred };
}

/** Delete phase, then add phase. Nothing runs concurrently. */
export async function applyDelta(
  session: RemoteSession,
  delta: Delta,
  opts: ApplyOptions,
): Promise<ApplyResult> {
  const deleted = await applyDeletes(session, delta.remove, opts);
  const { uploaded, bytesTransferred } = await applyAdds(
    session,
    delta.add,
    opts,
  );
  return { deleted, uploaded, bytesTransferred };
}
