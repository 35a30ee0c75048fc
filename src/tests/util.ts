import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Confirmer } from "../confirm.js";
import { StructuredLogger, type LogEntry } from "../logger.js";

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Writes `files` (relative path -> contents) under root, creating parents. */
export async function writeTree(
  root: string,
  files: Record<string, string>,
): Promise<void> {
  for (const [rel, contents] of Object.entries(files)) {
    const abs = path.join(root, ...rel.split("/"));
    await fsp.mkdir(path.dirname(abs), { recursive: true });
    await fsp.writeFile(abs, contents);
  }
}

export function captureLogger(): {
  logger: StructuredLogger;
  entries: LogEntry[];
  messages: (level?: LogEntry["level"]) => string[];
} {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({ sink: (e) => entries.push(e) });
  return {
    logger,
    entries,
    messages: (level) =>
      entries.filter((e) => !level || e.level === level).map((e) => e.message),
  };
}

/** Answers prompts from a fixed script and records the questions. */
export class ScriptedConfirmer implements Confirmer {
  readonly questions: string[] = [];
  constructor(private readonly answers: boolean[]) {}

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    return this.answers.shift() ?? false;
  }
}
