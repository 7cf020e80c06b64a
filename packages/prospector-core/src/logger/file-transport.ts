/**
 * Daily log files under `<stateDir>/logs`.
 *
 * Lines are appended synchronously so a CLI run that exits right after its
 * last log call loses nothing. The first file of a day is `2026-03-01.log`;
 * once it reaches maxFileSize the day continues in `2026-03-01.1.log`, `.2.log`...
 */

import fs from "node:fs";
import path from "node:path";
import type { LogEntry, LogTransport } from "./types.js";

export interface FileTransportOptions {
  dir: string;
  maxFileSize: number;
  maxRetentionDays: number;
  /** Clock for file names */
  now?: () => Date;
}

const DEFAULT_SIZE_BYTES = 10 * 1024 * 1024;
const DAY_MS = 24 * 60 * 60 * 1000;
const SIZE_FACTORS: Record<string, number> = { b: 1, kb: 1024, mb: 1024 ** 2, gb: 1024 ** 3 };

/** Parse "10MB", "512kb", "1GB" into bytes; unparsable input gives 10MB */
export function parseSizeToBytes(s: string): number {
  const m = s.trim().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/i);
  if (!m) return DEFAULT_SIZE_BYTES;
  const unit = (m[2] ?? "b").toLowerCase();
  return Math.floor(Number(m[1]) * (SIZE_FACTORS[unit] ?? 1));
}

/** `YYYY-MM-DD` in local time, matching what an operator sees on the host */
export function logFileDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

function logFileName(day: string, part: number): string {
  return part === 0 ? `${day}.log` : `${day}.${part}.log`;
}

function sizeOf(file: string): number {
  try {
    return fs.statSync(file).size;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return 0;
    throw err;
  }
}

/** Delete `.log` files last modified before the retention window; returns the removed names */
export async function removeExpiredLogs(dir: string, maxRetentionDays: number, now: Date = new Date()): Promise<string[]> {
  const cutoff = now.getTime() - maxRetentionDays * DAY_MS;
  const removed: string[] = [];
  for (const name of await fs.promises.readdir(dir)) {
    if (!name.endsWith(".log")) continue;
    const file = path.join(dir, name);
    const stat = await fs.promises.stat(file);
    if (stat.isFile() && stat.mtimeMs < cutoff) {
      await fs.promises.unlink(file);
      removed.push(name);
    }
  }
  return removed;
}

export function createFileTransport(opts: FileTransportOptions): LogTransport {
  const { dir, maxFileSize, maxRetentionDays } = opts;
  const now = opts.now ?? (() => new Date());
  fs.mkdirSync(dir, { recursive: true });

  let day = "";
  let part = 0;
  let size = 0;
  let disabled = false;

  function targetFile(): string {
    const today = logFileDate(now());
    if (today !== day) {
      day = today;
      part = 0;
      size = sizeOf(path.join(dir, logFileName(day, part)));
    }
    while (size >= maxFileSize) {
      part++;
      size = sizeOf(path.join(dir, logFileName(day, part)));
    }
    return path.join(dir, logFileName(day, part));
  }

  // Not through the logger: it is still being built
  const cleanup = removeExpiredLogs(dir, maxRetentionDays, now()).then(
    removed => {
      for (const name of removed) process.stderr.write(`[logger] Cleaned old log: ${name}\n`);
    },
    (err: unknown) => {
      process.stderr.write(`[logger] Log cleanup failed: ${err instanceof Error ? err.message : String(err)}\n`);
    },
  );

  return {
    write(_entry: LogEntry, formatted: string) {
      if (disabled) return;
      const line = formatted.endsWith("\n") ? formatted : formatted + "\n";
      try {
        fs.appendFileSync(targetFile(), line, "utf-8");
        size += Buffer.byteLength(line, "utf-8");
      } catch (err) {
        // EACCES, ENOSPC: no more file output for this process
        disabled = true;
        process.stderr.write(
          `[logger] File logging disabled: ${err instanceof Error ? err.message : String(err)}\n`,
        );
      }
    },
    async close() {
      await cleanup;
    },
  };
}
