import path from "node:path";
import type { Readable } from "node:stream";
import type {
  RemoteConnector,
  RemoteListEntry,
  RemoteSession,
} from "../remote-session.js";

type Node = { kind: "file"; data: Buffer } | { kind: "dir" };

export type FakeOp = "list" | "delete" | "rmdir" | "mkdir" | "upload";

/**
 * In-memory FTP-like server. Enforces what a real server would:
 * RMD only on empty directories, STOR/MKD only under an existing parent.
 */
export class FakeRemote implements RemoteSession {
  private readonly nodes = new Map<string, Node>();
  readonly ops: string[] = [];
  closeCount = 0;
  failOn?: (op: FakeOp, p: string) => boolean;

  constructor(readonly root = "/srv") {
    this.nodes.set(root, { kind: "dir" });
  }

  private check(op: FakeOp, p: string): void {
    if (this.failOn?.(op, p)) {
      throw new Error(`550 ${op} ${p} refused`);
    }
  }

  private parentMustBeDir(p: string): void {
    const parent = this.nodes.get(path.posix.dirname(p));
    if (!parent || parent.kind !== "dir") {
      throw new Error(`550 ${path.posix.dirname(p)}: no such directory`);
    }
  }

  private childrenOf(dir: string): string[] {
    const prefix = dir.endsWith("/") ? dir : `${dir}/`;
    return Array.from(this.nodes.keys()).filter(
      (p) => p.startsWith(prefix) && !p.slice(prefix.length).includes("/"),
    );
  }

  /** Seeds a file, creating its parents. Path is relative to the root. */
  seedFile(rel: string, sizeOrData: number | string): void {
    const parts = rel.split("/");
    let cur = this.root;
    for (const part of parts.slice(0, -1)) {
      cur = `${cur}/${part}`;
      if (!this.nodes.has(cur)) this.nodes.set(cur, { kind: "dir" });
    }
    const data =
      typeof sizeOrData === "number"
        ? Buffer.alloc(sizeOrData)
        : Buffer.from(sizeOrData);
    this.nodes.set(`${cur}/${parts[parts.length - 1]}`, { kind: "file", data });
  }

  seedDir(rel: string): void {
    let cur = this.root;
    for (const part of rel.split("/")) {
      cur = `${cur}/${part}`;
      if (!this.nodes.has(cur)) this.nodes.set(cur, { kind: "dir" });
    }
  }

  /** Relative path -> size for every file; directories map to -1. */
  snapshot(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [p, node] of this.nodes) {
      if (p === this.root) continue;
      out[p.slice(this.root.length + 1)] =
        node.kind === "file" ? node.data.length : -1;
    }
    return out;
  }

  contents(rel: string): string | undefined {
    const node = this.nodes.get(`${this.root}/${rel}`);
    return node?.kind === "file" ? node.data.toString("utf8") : undefined;
  }

  async list(p: string): Promise<RemoteListEntry[]> {
    this.ops.push(`list ${p}`);
    this.check("list", p);
    const node = this.nodes.get(p);
    if (!node || node.kind !== "dir") {
      throw new Error(`550 ${p}: no such directory`);
    }
    return this.childrenOf(p).map((child): RemoteListEntry => {
      const entry = this.nodes.get(child);
      return {
        name: path.posix.basename(child),
        type: entry?.kind === "file" ? "file" : "dir",
        size: entry?.kind === "file" ? entry.data.length : 4096,
      };
    });
  }

  async deleteFile(p: string): Promise<void> {
    this.ops.push(`delete ${p}`);
    this.check("delete", p);
    if (this.nodes.get(p)?.kind !== "file") {
      throw new Error(`550 ${p}: no such file`);
    }
    this.nodes.delete(p);
  }

  async removeDir(p: string): Promise<void> {
    this.ops.push(`rmdir ${p}`);
    this.check("rmdir", p);
    if (this.nodes.get(p)?.kind !== "dir") {
      throw new Error(`550 ${p}: no such directory`);
    }
    if (this.childrenOf(p).length) {
      throw new Error(`550 ${p}: directory not empty`);
    }
    this.nodes.delete(p);
  }

  async makeDir(p: string): Promise<void> {
    this.ops.push(`mkdir ${p}`);
    this.check("mkdir", p);
    const existing = this.nodes.get(p);
    if (existing?.kind === "dir") return;
    if (existing) throw new Error(`550 ${p}: file exists`);
    this.parentMustBeDir(p);
    this.nodes.set(p, { kind: "dir" });
  }

  async upload(p: string, source: Readable): Promise<void> {
    this.ops.push(`upload ${p}`);
    this.check("upload", p);
    this.parentMustBeDir(p);
    if (this.nodes.get(p)?.kind === "dir") {
      throw new Error(`550 ${p}: is a directory`);
    }
    const chunks: Buffer[] = [];
    for await (const chunk of source) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    this.nodes.set(p, { kind: "file", data: Buffer.concat(chunks) });
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }

  /** Connector handing out this same instance on every connect. */
  connector(): RemoteConnector {
    return async () => this;
  }

  mutations(): string[] {
    return this.ops.filter((op) => !op.startsWith("list "));
  }
}
