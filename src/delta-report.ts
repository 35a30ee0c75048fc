// src/delta-report.ts
import { AlignmentEnum, AsciiTable3 } from "ascii-table3";
import { deltaVolume, type Delta } from "./delta.js";
import { fmtMegabytes, shortenPath } from "./format.js";
import type { Logger } from "./logger.js";
import type { PathEntry } from "./path-entry.js";

export interface DeltaSummary {
  addCount: number;
  addBytes: number;
  removeCount: number;
  removeBytes: number;
}

export function describeEntry(sign: "+" | "-", entry: PathEntry): string {
  const what = entry.kind === "dir" ? "dir" : fmtMegabytes(entry.size);
  return `${sign} ${shortenPath(entry.relPath)} (${what})`;
}

export function summarizeDelta(delta: Delta): DeltaSummary {
  return {
    addCount: delta.add.length,
    addBytes: deltaVolume(delta.add),
    removeCount: delta.remove.length,
    removeBytes: deltaVolume(delta.remove),
  };
}

/** Logs the planned operations; nothing is touched yet. */
export function reportDelta(delta: Delta, logger: Logger): DeltaSummary {
  logger.info("Files to sync to target:");
  if (delta.add.length === 0) {
    logger.info("! Nothing to sync");
  }
  for (const entry of delta.add) {
    logger.info(describeEntry("+", entry));
  }
  logger.info("Files/directories to remove on target:");
  if (delta.remove.length === 0) {
    logger.info("! Nothing to remove");
  }
  for (const entry of delta.remove) {
    logger.info(describeEntry("-", entry));
  }
  return summarizeDelta(delta);
}

export function renderDeltaTable(summary: DeltaSummary): string {
  const table = new AsciiTable3("Planned changes")
    .setHeading("Operation", "Entries", "Volume")
    .setStyle("unicode-round");
  table.setAlign(1, AlignmentEnum.LEFT);
  table.setAlign(2, AlignmentEnum.RIGHT);
  table.setAlign(3, AlignmentEnum.RIGHT);
  table.addRow("upload", summary.addCount, fmtMegabytes(summary.addBytes));
  table.addRow(
    "remove",
    summary.removeCount,
    fmtMegabytes(summary.removeBytes),
  );
  return table.toString();
}
