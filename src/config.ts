// src/config.ts
import { readFile } from "node:fs/promises";
import {
  DEFAULT_CONFIG_FILE,
  DEFAULT_FTP_PORT,
  DEFAULT_FTP_USER,
  DEFAULT_TIMEOUT_MS,
} from "./constants.js";
import { ConfigError, errnoCode, errorMessage } from "./errors.js";
import { normalizeIgnorePatterns } from "./ignore.js";
import type { RemoteTarget } from "./remote-session.js";

export interface SyncConfig {
  sourceDirectory: string;
  targetDirectory: string;
  target: RemoteTarget;
  ignore: string[];
}

/** Command-line values; each one set replaces the file's value. */
export interface ConfigOverrides {
  sourceDir?: string;
  target?: string;
  targetDir?: string;
  port?: string | number;
  ignore?: string[];
}

type RawConfig = Record<string, unknown>;

const KNOWN_KEYS = new Set([
  "source_directory",
  "target_ip_address",
  "target_directory",
  "target_port",
  "target_user",
  "target_password",
  "target_secure",
  "timeout_ms",
  "ignore",
]);

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads the JSON settings file. A missing file yields null unless the caller
 * named it explicitly.
 */
export async function readConfigFile(
  file: string,
  { required = false }: { required?: boolean } = {},
): Promise<RawConfig | null> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT" && !required) return null;
    throw new ConfigError(
      `cannot read config file ${file}: ${errorMessage(err)}`,
      { file },
      { cause: err },
    );
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `config file ${file} is not valid JSON: ${errorMessage(err)}`,
      { file },
      { cause: err },
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`config file ${file} must hold a JSON object`, {
      file,
    });
  }
  const unknown = Object.keys(parsed).filter((key) => !KNOWN_KEYS.has(key));
  if (unknown.length) {
    throw new ConfigError(
      `unknown setting${unknown.length > 1 ? "s" : ""} in ${file}: ${unknown.join(", ")}`,
      { file, keys: unknown },
    );
  }
  return parsed;
}

function optString(raw: RawConfig, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`setting ${key} must be a string`, { key });
  }
  return value;
}

function optBoolean(raw: RawConfig, key: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`setting ${key} must be true or false`, { key });
  }
  return value;
}

function optStringList(raw: RawConfig, key: string): string[] {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    throw new ConfigError(`setting ${key} must be a list of strings`, { key });
  }
  return value.filter((v): v is string => typeof v === "string");
}

function parsePositiveInt(
  value: unknown,
  key: string,
  max = Number.MAX_SAFE_INTEGER,
): number | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const n = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof n !== "number" || !Number.isInteger(n) || n < 1 || n > max) {
    throw new ConfigError(`setting ${key} must be an integer between 1 and ${max}`, {
      key,
      value,
    });
  }
  return n;
}

function required(value: string | undefined, key: string, flag: string): string {
  if (!value || !value.trim()) {
    throw new ConfigError(
      `missing setting ${key} (set it in the config file or pass ${flag})`,
      { key },
    );
  }
  return value;
}

export function resolveConfig(
  raw: RawConfig | null,
  overrides: ConfigOverrides = {},
): SyncConfig {
  const file = raw ?? {};
  const sourceDirectory = required(
    overrides.sourceDir ?? optString(file, "source_directory"),
    "source_directory",
    "--source-dir",
  );
  const host = required(
    overrides.target ?? optString(file, "target_ip_address"),
    "target_ip_address",
    "--target",
  );
  const targetDirectory = required(
    overrides.targetDir ?? optString(file, "target_directory"),
    "target_directory",
    "--target-dir",
  );
  const port =
    parsePositiveInt(overrides.port, "port", 65535) ??
    parsePositiveInt(file.target_port, "target_port", 65535) ??
    DEFAULT_FTP_PORT;
  const timeoutMs =
    parsePositiveInt(file.timeout_ms, "timeout_ms") ?? DEFAULT_TIMEOUT_MS;

  return {
    sourceDirectory,
    targetDirectory: normalizeRemoteRoot(targetDirectory),
    target: {
      host,
      port,
      user: optString(file, "target_user") ?? DEFAULT_FTP_USER,
      password: optString(file, "target_password") ?? "",
      secure: optBoolean(file, "target_secure") ?? false,
      timeoutMs,
    },
    ignore: normalizeIgnorePatterns([
      ...optStringList(file, "ignore"),
      ...(overrides.ignore ?? []),
    ]),
  };
}

// "/media/" and "/media" name the same remote root; "/" stays as is.
export function normalizeRemoteRoot(dir: string): string {
  const trimmed = dir.trim().replace(/\\/g, "/");
  const stripped = trimmed.replace(/\/+$/, "");
  return stripped || (trimmed.startsWith("/") ? "/" : "");
}

export async function loadConfig(
  overrides: ConfigOverrides = {},
  { file, explicit = false }: { file?: string; explicit?: boolean } = {},
): Promise<SyncConfig> {
  const raw = await readConfigFile(file ?? DEFAULT_CONFIG_FILE, {
    required: explicit,
  });
  return resolveConfig(raw, overrides);
}
