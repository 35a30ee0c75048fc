// src/ftp-session.ts
import { Client, type FileInfo } from "basic-ftp";
import path from "node:path";
import type { Readable } from "node:stream";
import { ConnectivityError, errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import type {
  RemoteConnector,
  RemoteEntryType,
  RemoteListEntry,
  RemoteSession,
  RemoteTarget,
} from "./remote-session.js";

function entryType(info: FileInfo): RemoteEntryType {
  if (info.isDirectory) return "dir";
  if (info.isFile) return "file";
  return "other";
}

function parentOf(remotePath: string): string {
  const parent = path.posix.dirname(remotePath);
  return parent === "." ? "" : parent;
}

/** The part of basic-ftp's Client a session talks to. */
export type FtpClient = Pick<
  Client,
  | "access"
  | "list"
  | "remove"
  | "removeEmptyDir"
  | "sendIgnoringError"
  | "uploadFrom"
  | "close"
  | "closed"
> & { ftp: { verbose: boolean } };

export type FtpClientFactory = (timeoutMs: number) => FtpClient;

const createClient: FtpClientFactory = (timeoutMs) => new Client(timeoutMs);

/** RemoteSession over one basic-ftp control connection. */
export class FtpSession implements RemoteSession {
  constructor(
    private readonly client: FtpClient,
    private readonly logger: Logger = new NullLogger(),
  ) {}

  async list(remotePath: string): Promise<RemoteListEntry[]> {
    const rows = await this.client.list(remotePath);
    return rows.map((info) => ({
      name: info.name,
      type: entryType(info),
      size: info.size,
    }));
  }

  async deleteFile(remotePath: string): Promise<void> {
    await this.client.remove(remotePath);
  }

  async removeDir(remotePath: string): Promise<void> {
    await this.client.removeEmptyDir(remotePath);
  }

  // Servers answer MKD on an existing directory with an error code, and the
  // code alone does not say why; look at the parent before giving up.
  async makeDir(remotePath: string): Promise<void> {
    const res = await this.client.sendIgnoringError(`MKD ${remotePath}`);
    if (res.code < 400) return;
    const name = path.posix.basename(remotePath);
    const siblings = await this.client.list(parentOf(remotePath));
    if (siblings.some((info) => info.name === name && info.isDirectory)) {
      this.logger.debug("directory already exists", { path: remotePath });
      return;
    }
    throw new Error(`MKD ${remotePath} refused: ${res.message}`);
  }

  async upload(remotePath: string, source: Readable): Promise<void> {
    await this.client.uploadFrom(source, remotePath);
  }

  async close(): Promise<void> {
    if (!this.client.closed) this.client.close();
  }
}

/** Opens one FTP session; fails with ConnectivityError. */
export function ftpConnector(
  logger: Logger = new NullLogger(),
  newClient: FtpClientFactory = createClient,
): RemoteConnector {
  return async (target: RemoteTarget) => {
    const client = newClient(target.timeoutMs);
    client.ftp.verbose = logger.isLevelEnabled("debug");
    try {
      const welcome = await client.access({
        host: target.host,
        port: target.port,
        user: target.user,
        password: target.password,
        secure: target.secure,
      });
      if (welcome.message) {
        logger.info(`Greeting from target: ${welcome.message.trim()}`);
      }
    } catch (err) {
      client.close();
      throw new ConnectivityError(
        `cannot connect to ${target.host}:${target.port}: ${errorMessage(err)}`,
        { host: target.host, port: target.port, user: target.user },
        { cause: err },
      );
    }
    return new FtpSession(client, logger);
  };
}
