export const CLI_NAME = "ftp-mirror";

export const DEFAULT_CONFIG_FILE = "./config.json";

export const DEFAULT_FTP_PORT = 21;
export const DEFAULT_FTP_USER = "anonymous";
export const DEFAULT_TIMEOUT_MS = 30_000;

// Directories carry a fixed size so local and remote dirs always compare equal.
export const DIR_SIZE = 4096;

// Accounting weight of a zero-byte upload; a pass that uploaded anything
// never reports zero bytes transferred.
export const EMPTY_FILE_WEIGHT = 1;

// Longer paths are shortened in log lines.
export const MAX_LOG_PATH = 77;
