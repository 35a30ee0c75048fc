export {
  SIZE_COMPARATOR,
  byPath,
  dirEntry,
  fileEntry,
  sortedEntries,
  toFlatSet,
  type EntryComparator,
  type EntryKind,
  type FlatSet,
  type PathEntry,
} from "./path-entry.js";

export {
  scanLocal,
  type LocalScanOptions,
  type LocalScanResult,
} from "./scan-local.js";

export {
  scanRemote,
  remoteDir,
  remoteFile,
  type RemoteDir,
  type RemoteFile,
  type RemoteNode,
} from "./scan-remote.js";

export { flattenRemote } from "./flatten.js";

export {
  computeDelta,
  isDeltaEmpty,
  sortChildFirst,
  type Delta,
} from "./delta.js";

export {
  reportDelta,
  renderDeltaTable,
  summarizeDelta,
  type DeltaSummary,
} from "./delta-report.js";

export {
  applyDelta,
  applyAdds,
  applyDeletes,
  type ApplyOptions,
  type ApplyResult,
} from "./apply.js";

export {
  runSync,
  type SyncOptions,
  type SyncResult,
  type SyncStatus,
} from "./sync.js";

export {
  loadConfig,
  resolveConfig,
  type ConfigOverrides,
  type SyncConfig,
} from "./config.js";

export {
  FtpSession,
  ftpConnector,
  type FtpClient,
  type FtpClientFactory,
} from "./ftp-session.js";

export type {
  RemoteConnector,
  RemoteEntryType,
  RemoteListEntry,
  RemoteSession,
  RemoteTarget,
} from "./remote-session.js";

export {
  ALWAYS_CONFIRM,
  PromptConfirmer,
  type Confirmer,
} from "./confirm.js";

export {
  ApplyError,
  ConfigError,
  ConnectivityError,
  EnumerationError,
  LocalIOError,
  SyncError,
  type SyncErrorKind,
} from "./errors.js";

export {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";
