import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface Logger {
  child(scope: string): Logger;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type Sink = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: Sink;
  // entries at or above minLevel are also written for the operator
  echo?: { minLevel: LogLevel; writer?: Sink };
  minLevel?: LogLevel;
}

function echoDisabled(): boolean {
  const raw = process.env.FTP_MIRROR_DISABLE_LOG_ECHO?.trim().toLowerCase();
  return !!raw && raw !== "0" && raw !== "false";
}

const MARKERS: Record<LogLevel, string> = {
  debug: "· ",
  info: "",
  warn: "⚠️ ",
  error: "⛔ ",
};

// info lines are the transcript of a pass and print bare
const stderrEcho: Sink = ({ level, scope, message, meta }) => {
  if (echoDisabled()) return;
  const scopeText = scope && level !== "info" ? `[${scope}] ` : "";
  const line = `${MARKERS[level]}${scopeText}${message}`;
  if (meta) {
    console.error(line, inspect(meta, { depth: 4, breakLength: Infinity }));
  } else {
    console.error(line);
  }
};

export class StructuredLogger implements Logger {
  constructor(private readonly opts: LoggerOptions = {}) {}

  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new StructuredLogger({
      ...this.opts,
      scope: parent ? `${parent}.${scope}` : scope,
    });
  }

  private emit(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (!this.isLevelEnabled(level)) return;
    const entry: LogEntry = {
      level,
      scope: this.opts.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.opts.sink?.(entry);
    const { echo } = this.opts;
    if (echo && levelAtOrAbove(echo.minLevel, level)) {
      (echo.writer ?? stderrEcho)(entry);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.emit("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    const { minLevel } = this.opts;
    return minLevel ? levelAtOrAbove(minLevel, level) : true;
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

/** Operator-facing logger: everything at `minLevel` and above goes to stderr. */
export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({ echo: { minLevel }, minLevel });
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((lvl) => lvl === value);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  const normalized = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : fallback;
}

/** Level from the LOGLEVEL environment variable, `info` when unset. */
export function defaultLogLevel(): LogLevel {
  return parseLogLevel(process.env.LOGLEVEL, "info");
}

export function levelAtOrAbove(
  desired: LogLevel,
  candidate: LogLevel,
): boolean {
  return LEVEL_ORDER[candidate] >= LEVEL_ORDER[desired];
}
