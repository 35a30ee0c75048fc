#!/usr/bin/env node
// src/cli.ts
import { Command, Option } from "commander";
import {
  cliEntrypoint,
  readPackageVersion,
  reportFatal,
} from "./cli-util.js";
import { loadConfig } from "./config.js";
import { ALWAYS_CONFIRM, PromptConfirmer, type Confirmer } from "./confirm.js";
import { CLI_NAME, DEFAULT_CONFIG_FILE } from "./constants.js";
import { ftpConnector } from "./ftp-session.js";
import { collectIgnoreOption } from "./ignore.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  defaultLogLevel,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import type { RemoteConnector } from "./remote-session.js";
import { runSync } from "./sync.js";

export type CliOptions = {
  sourceDir?: string;
  target?: string;
  targetDir?: string;
  port?: string;
  config?: string;
  ignore: string[];
  yes: boolean;
  dryRun: boolean;
  logLevel: string;
};

export interface CliDeps {
  logger?: Logger;
  connect?: RemoteConnector;
  confirmer?: Confirmer;
}

const NO_PATTERNS: string[] = [];

export function buildProgram(): Command {
  return new Command()
    .name(CLI_NAME)
    .description(
      "Mirror a local directory onto an FTP server. Local is master: " +
        "files missing on the target are uploaded, files gone locally are " +
        "removed from the target. Options override the config file.",
    )
    .version(readPackageVersion())
    .option("--source-dir <path>", "source directory to sync")
    .option("--target <host>", "sync target host name or IP address")
    .option("--target-dir <path>", "path to target directory")
    .option("--port <number>", "FTP port of the target")
    .option(
      "-c, --config <file>",
      `settings file (default ${DEFAULT_CONFIG_FILE})`,
    )
    .option(
      "-i, --ignore <pattern>",
      "gitignore-style rule for local paths (repeat or comma-separated)",
      collectIgnoreOption,
      NO_PATTERNS,
    )
    .option("-y, --yes", "answer yes to every confirmation prompt", false)
    .option("--dry-run", "show the plan without changing the target", false)
    .addOption(
      new Option("--log-level <level>", "log verbosity")
        .choices(LOG_LEVELS)
        .default(defaultLogLevel()),
    );
}

export async function runCli(
  opts: CliOptions,
  deps: CliDeps = {},
): Promise<number> {
  const logger = deps.logger ?? new ConsoleLogger(parseLogLevel(opts.logLevel));
  try {
    const config = await loadConfig(
      {
        sourceDir: opts.sourceDir,
        target: opts.target,
        targetDir: opts.targetDir,
        port: opts.port,
        ignore: opts.ignore,
      },
      { file: opts.config, explicit: Boolean(opts.config) },
    );
    await runSync({
      config,
      connect: deps.connect ?? ftpConnector(logger.child("ftp")),
      confirmer: deps.confirmer ?? (opts.yes ? ALWAYS_CONFIRM : new PromptConfirmer()),
      logger,
      dryRun: opts.dryRun,
    });
    return 0;
  } catch (err) {
    reportFatal(err, logger);
    return 1;
  }
}

cliEntrypoint<CliOptions>(module, buildProgram, (opts) => runCli(opts), {
  label: CLI_NAME,
});
