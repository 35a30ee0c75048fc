import { MAX_LOG_PATH } from "./constants.js";

export function bytesToMegabytes(bytes: number): number {
  return Math.round((bytes / (1 << 20)) * 100) / 100;
}

export function fmtMegabytes(bytes: number): string {
  return `${bytesToMegabytes(bytes)} MB`;
}

/** Keeps the tail of a long path: "...<last MAX_LOG_PATH chars>". */
export function shortenPath(p: string, max = MAX_LOG_PATH): string {
  return p.length > max ? `...${p.slice(p.length - max)}` : p;
}

export function fmtDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.floor(totalSeconds - minutes * 60);
  if (minutes < 60) return `${minutes}m${String(seconds).padStart(2, "0")}s`;
  const hours = Math.floor(minutes / 60);
  return `${hours}h${String(minutes % 60).padStart(2, "0")}m`;
}
