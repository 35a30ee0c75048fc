// src/cli-util.ts
import { Command, type OptionValues } from "commander";
import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { SyncError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

/**
 * Minimal CLI bootstrap:
 * - If `mod` is the process entry module, parse argv and call `run(opts)`
 * - If imported, do nothing (so caller can call run() directly)
 *
 * The exit status is whatever `run` resolves to.
 */
export function cliEntrypoint<T extends OptionValues>(
  mod: NodeModule,
  buildProgram: () => Command,
  run: (opts: T, program: Command) => Promise<number>,
  opts?: { label?: string },
): void {
  if (require.main !== mod) return;

  const program = buildProgram();
  const parsed = program.parse(process.argv);
  run(parsed.opts<T>(), program).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      const label = opts?.label || program.name() || "command";
      console.error(`${label} fatal:`, err instanceof Error ? err.stack : err);
      process.exitCode = 1;
    },
  );
}

/** Handy for tests: run a command with custom argv without touching the exit code */
export async function parseAndRun<T extends OptionValues>(
  buildProgram: () => Command,
  run: (opts: T, program: Command) => Promise<number>,
  argv: string[],
): Promise<number> {
  const program = buildProgram();
  const parsed = program.parse(argv, { from: "user" });
  return run(parsed.opts<T>(), program);
}

export function reportFatal(err: unknown, logger: Logger): void {
  if (err instanceof SyncError) {
    logger.error(err.message, { kind: err.kind, ...err.context });
  } else {
    logger.error(errorMessage(err));
  }
  if (err instanceof Error && err.stack && logger.isLevelEnabled("debug")) {
    logger.debug(err.stack);
  }
}

export function readPackageVersion(): string {
  const file = path.join(__dirname, "..", "package.json");
  if (!existsSync(file)) return "0.0.0";
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (typeof raw === "object" && raw !== null && "version" in raw) {
    return typeof raw.version === "string" ? raw.version : "0.0.0";
  }
  return "0.0.0";
}
