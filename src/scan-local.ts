// src/scan-local.ts
import * as walk from "@nodelib/fs.walk";
import { access, constants, stat } from "node:fs/promises";
import path from "node:path";
import { ConfigError, LocalIOError, errnoCode, errorMessage } from "./errors.js";
import { createIgnorer, isHiddenName } from "./ignore.js";
import { NullLogger, type Logger } from "./logger.js";
import { dirEntry, fileEntry, type FlatSet, type PathEntry } from "./path-entry.js";
import { ancestors, toAbs, toRel } from "./path-rel.js";

// Errors that drop a single entry from the scan instead of ending it.
const SKIPPABLE_CODES = new Set(["EACCES", "EPERM", "ENOENT", "ENOTDIR", "ELOOP"]);

export interface LocalScanOptions {
  ignore?: readonly string[];
  logger?: Logger;
}

export interface LocalScanResult {
  entries: FlatSet;
  warnings: LocalIOError[];
}

export async function assertLocalRoot(root: string): Promise<void> {
  const st = await stat(root).catch((err: unknown) => {
    throw new ConfigError(
      `source directory not found: ${root}`,
      { root, code: errnoCode(err) },
      { cause: err },
    );
  });
  if (!st.isDirectory()) {
    throw new ConfigError(`source path is not a directory: ${root}`, { root });
  }
  // an unreadable root must fail here, never scan as empty
  await access(root, constants.R_OK | constants.X_OK).catch((err: unknown) => {
    throw unreadableRoot(root, err);
  });
}

function unreadableRoot(root: string, err: unknown): ConfigError {
  const code = errnoCode(err);
  return new ConfigError(
    `source directory is not readable: ${root} (${code ?? errorMessage(err)})`,
    { root, code },
    { cause: err },
  );
}

/**
 * Flat view of every non-hidden file under `root`, plus each directory that
 * has at least one such file somewhere below it.
 *
 * Symbolic links are never descended. A link to a regular file is taken as
 * that file; any other link is skipped with a warning.
 */
export async function scanLocal(
  root: string,
  { ignore = [], logger = new NullLogger() }: LocalScanOptions = {},
): Promise<LocalScanResult> {
  const absRoot = path.resolve(root);
  await assertLocalRoot(absRoot);

  const ig = createIgnorer(ignore);
  const warnings: LocalIOError[] = [];
  const skip = (err: LocalIOError) => {
    warnings.push(err);
    logger.warn(err.message, err.context);
  };

  const stream = walk.walkStream(absRoot, {
    followSymbolicLinks: false,
    deepFilter: (e) => !ig.ignoresDir(toRel(e.path, absRoot)),
    errorFilter: (error) => {
      const code = errnoCode(error);
      if (!code || !SKIPPABLE_CODES.has(code)) return false;
      if (!error.path || path.resolve(error.path) === absRoot) return false;
      const p = error.path;
      skip(new LocalIOError(`skipping unreadable ${p}: ${code}`, p, code, { cause: error }));
      return true;
    },
  });

  const files: PathEntry[] = [];
  const dirs = new Map<string, string>();

  try {
    for await (const item of stream) {
      const entry: walk.Entry = item;
      const rel = toRel(entry.path, absRoot);
      if (entry.dirent.isDirectory()) {
        dirs.set(rel, entry.path);
        continue;
      }
      if (!entry.dirent.isFile() && !entry.dirent.isSymbolicLink()) {
        logger.debug("skipping special file", { path: rel });
        continue;
      }
      if (isHiddenName(entry.name)) {
        logger.debug("skipping hidden file", { path: rel });
        continue;
      }
      if (ig.ignoresFile(rel)) {
        logger.debug("skipping ignored file", { path: rel });
        continue;
      }
      const size = await regularFileSize(entry, skip);
      if (size == null) continue;
      files.push(fileEntry(rel, size, entry.path));
    }
  } catch (err) {
    const failed = errorPath(err);
    if (errnoCode(err) && failed && path.resolve(failed) === absRoot) {
      throw unreadableRoot(absRoot, err);
    }
    throw err;
  }

  const entries: FlatSet = new Map();
  for (const file of files) {
    for (const dir of ancestors(file.relPath)) {
      if (!entries.has(dir)) {
        entries.set(dir, dirEntry(dir, dirs.get(dir) ?? toAbs(dir, absRoot)));
      }
    }
    entries.set(file.relPath, file);
  }
  logger.debug("local scan complete", {
    root: absRoot,
    files: files.length,
    dirs: entries.size - files.length,
    skipped: warnings.length,
  });
  return { entries, warnings };
}

async function regularFileSize(
  entry: walk.Entry,
  skip: (err: LocalIOError) => void,
): Promise<number | null> {
  const st = await stat(entry.path).catch((err: unknown) => {
    const code = errnoCode(err);
    skip(
      new LocalIOError(
        `skipping unreadable ${entry.path}: ${code ?? errorMessage(err)}`,
        entry.path,
        code,
        { cause: err },
      ),
    );
    return null;
  });
  if (st == null) return null;
  if (st.isFile()) return st.size;
  skip(
    new LocalIOError(
      `not following link to a non-file: ${entry.path}`,
      entry.path,
    ),
  );
  return null;
}

function errorPath(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("path" in err)) {
    return undefined;
  }
  const { path: p } = err;
  return typeof p === "string" ? p : undefined;
}
