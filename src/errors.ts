export type SyncErrorKind =
  | "config"
  | "connectivity"
  | "enumeration"
  | "apply"
  | "local-io";

export class SyncError extends Error {
  override readonly cause?: unknown;

  constructor(
    message: string,
    public readonly kind: SyncErrorKind,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = "SyncError";
    this.cause = options?.cause;
  }

  /** Fatal errors end the pass; the rest are reported and skipped. */
  get fatal(): boolean {
    return this.kind !== "local-io";
  }
}

export class ConfigError extends SyncError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "config", context, options);
    this.name = "ConfigError";
  }
}

export class ConnectivityError extends SyncError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "connectivity", context, options);
    this.name = "ConnectivityError";
  }
}

export class EnumerationError extends SyncError {
  constructor(
    message: string,
    public readonly remotePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, "enumeration", { remotePath }, options);
    this.name = "EnumerationError";
  }
}

export type ApplyPhase = "delete" | "add";

export class ApplyError extends SyncError {
  constructor(
    message: string,
    public readonly phase: ApplyPhase,
    public readonly relPath: string,
    options?: { cause?: unknown },
  ) {
    super(message, "apply", { phase, relPath }, options);
    this.name = "ApplyError";
  }
}

export class LocalIOError extends SyncError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, "local-io", code ? { path, code } : { path }, options);
    this.name = "LocalIOError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}
