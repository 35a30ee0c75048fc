// src/sync.ts
import type { Readable } from "node:stream";
import { applyDelta, type ApplyResult } from "./apply.js";
import type { SyncConfig } from "./config.js";
import type { Confirmer } from "./confirm.js";
import { computeDelta, isDeltaEmpty, type Delta } from "./delta.js";
import {
  renderDeltaTable,
  reportDelta,
  type DeltaSummary,
} from "./delta-report.js";
import {
  ConnectivityError,
  SyncError,
  errorMessage,
  type LocalIOError,
} from "./errors.js";
import { flattenRemote } from "./flatten.js";
import { fmtDuration, fmtMegabytes } from "./format.js";
import { NullLogger, type Logger } from "./logger.js";
import type { RemoteConnector, RemoteSession } from "./remote-session.js";
import { scanLocal } from "./scan-local.js";
import { isEmptyTree, scanRemote } from "./scan-remote.js";

export type SyncStatus = "synced" | "unchanged" | "cancelled";

export interface SyncOptions {
  config: SyncConfig;
  connect: RemoteConnector;
  confirmer: Confirmer;
  logger?: Logger;
  dryRun?: boolean;
  clock?: () => number;
  openSource?: (absPath: string) => Readable;
}

export interface SyncResult {
  status: SyncStatus;
  delta: Delta | null;
  summary: DeltaSummary | null;
  applied: ApplyResult;
  warnings: LocalIOError[];
  durationMs: number;
}

const NOTHING_APPLIED: ApplyResult = {
  deleted: 0,
  uploaded: 0,
  bytesTransferred: 0,
};

async function openSession(
  connect: RemoteConnector,
  config: SyncConfig,
): Promise<RemoteSession> {
  try {
    return await connect(config.target);
  } catch (err) {
    if (err instanceof SyncError) throw err;
    throw new ConnectivityError(
      `cannot connect to ${config.target.host}: ${errorMessage(err)}`,
      { host: config.target.host, port: config.target.port },
      { cause: err },
    );
  }
}

/**
 * One mirroring pass: scan local, scan remote, show the plan, confirm
 * deletions, then delete and upload.
 *
 * The session is opened after the local scan and closed before returning,
 * whatever happens in between.
 */
export async function runSync({
  config,
  connect,
  confirmer,
  logger = new NullLogger(),
  dryRun = false,
  clock = Date.now,
  openSource,
}: SyncOptions): Promise<SyncResult> {
  const started = clock();
  const local = await scanLocal(config.sourceDirectory, {
    ignore: config.ignore,
    logger: logger.child("local"),
  });
  const finish = (
    status: SyncStatus,
    rest: Partial<Pick<SyncResult, "delta" | "summary" | "applied">> = {},
  ): SyncResult => ({
    status,
    delta: rest.delta ?? null,
    summary: rest.summary ?? null,
    applied: rest.applied ?? NOTHING_APPLIED,
    warnings: local.warnings,
    durationMs: clock() - started,
  });

  const reportDuration = (result: SyncResult): SyncResult => {
    logger.info(
      `${dryRun ? "Dry run" : "Sync"} took ${fmtDuration(result.durationMs)} (${fmtMegabytes(result.applied.bytesTransferred)} ${dryRun ? "would be " : ""}transferred)`,
    );
    return result;
  };

  if (local.entries.size === 0 && !dryRun) {
    const wipe = await confirmer.confirm(
      "Source (local) directory is empty. Delete everything on target?",
    );
    if (!wipe) {
      logger.info("Cancelled; target left untouched");
      return finish("cancelled");
    }
  }

  logger.info("Authenticating...");
  const session = await openSession(connect, config);
  try {
    logger.info("Getting target directory content...");
    const tree = await scanRemote(session, config.targetDirectory, {
      logger: logger.child("remote"),
    });
    if (isEmptyTree(tree)) {
      logger.info("No files found on target...");
    }
    const remote = flattenRemote(tree);

    const delta = computeDelta(local.entries, remote);
    const summary = reportDelta(delta, logger);
    if (isDeltaEmpty(delta)) {
      logger.info("Target is up to date");
      return reportDuration(finish("unchanged", { delta, summary }));
    }
    logger.info(renderDeltaTable(summary));

    if (delta.remove.length && !dryRun) {
      const proceed = await confirmer.confirm(
        `Remove ${delta.remove.length} entr${delta.remove.length === 1 ? "y" : "ies"} from target and continue?`,
      );
      if (!proceed) {
        logger.info("Cancelled; target left untouched");
        return finish("cancelled", { delta, summary });
      }
    }

    const applied = await applyDelta(session, delta, {
      localRoot: config.sourceDirectory,
      remoteRoot: config.targetDirectory,
      logger,
      dryRun,
      openSource,
    });
    return reportDuration(finish("synced", { delta, summary, applied }));
  } finally {
    await session.close().catch((err: unknown) => {
      logger.warn("failed to close remote session", {
        error: errorMessage(err),
      });
    });
  }
}
