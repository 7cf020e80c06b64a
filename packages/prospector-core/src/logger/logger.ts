/**
 * Logger core: several transports, level filtering, child loggers with a
 * module prefix.
 */

import type { LogEntry, LogLevel, LogTransport, LoggerOptions } from "./types.js";
import { LOG_LEVEL_WEIGHT, isLogLevel } from "./types.js";
import { createConsoleTransport } from "./console-transport.js";
import { createFileTransport, parseSizeToBytes } from "./file-transport.js";
import path from "node:path";

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;
const DEFAULT_MAX_RETENTION_DAYS = 7;

export function formatLogEntry(entry: LogEntry): string {
  const ts = entry.timestamp.toISOString();
  const level = entry.level.toUpperCase().padEnd(5);
  const modulePart = entry.module ? ` [${entry.module}]` : "";
  let msg = entry.message;
  if (entry.data !== undefined) {
    try {
      const dataStr = typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data);
      msg += " " + dataStr;
    } catch {
      msg += " [object]";
    }
  }
  return `[${ts}] [${level}]${modulePart} ${msg}`;
}

export interface ProspectorLogger {
  debug(module: string, message: string, data?: unknown): void;
  info(module: string, message: string, data?: unknown): void;
  warn(module: string, message: string, data?: unknown): void;
  error(module: string, message: string, data?: unknown): void;
  /** Logger whose entries all carry the module prefix */
  child(module: string): ChildLogger;
  close(): void | Promise<void>;
}

export interface ChildLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function createLogger(opts: LoggerOptions & { stateDir: string }): ProspectorLogger {
  const level = opts.level ?? "debug";
  const levelWeight = LOG_LEVEL_WEIGHT[level];

  const logDir = opts.dir ?? path.join(opts.stateDir, "logs");
  const maxFileSize = opts.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
  const maxRetentionDays = opts.maxRetentionDays ?? DEFAULT_MAX_RETENTION_DAYS;
  const defaultModule = opts.defaultModule ?? "";

  const transports: LogTransport[] = [];
  if (opts.enableConsole !== false) transports.push(createConsoleTransport());
  if (opts.enableFile !== false) transports.push(createFileTransport({ dir: logDir, maxFileSize, maxRetentionDays }));
  transports.push(...(opts.transports ?? []));

  function log(entryLevel: LogLevel, module: string, message: string, data?: unknown): void {
    if (LOG_LEVEL_WEIGHT[entryLevel] < levelWeight) return;
    const entry: LogEntry = {
      timestamp: new Date(),
      level: entryLevel,
      module: module || defaultModule,
      message,
      data,
    };
    const formatted = formatLogEntry(entry);
    for (const t of transports) {
      t.write(entry, formatted);
    }
  }

  const logger: ProspectorLogger = {
    debug(m, msg, data) {
      log("debug", m, msg, data);
    },
    info(m, msg, data) {
      log("info", m, msg, data);
    },
    warn(m, msg, data) {
      log("warn", m, msg, data);
    },
    error(m, msg, data) {
      log("error", m, msg, data);
    },
    child(module: string): ChildLogger {
      return {
        debug(msg, data) {
          logger.debug(module, msg, data);
        },
        info(msg, data) {
          logger.info(module, msg, data);
        },
        warn(msg, data) {
          logger.warn(module, msg, data);
        },
        error(msg, data) {
          logger.error(module, msg, data);
        },
      };
    },
    async close() {
      await Promise.all(transports.map(t => t.close?.()));
    },
  };

  return logger;
}

/** Build the logger from PROSPECTOR_LOG_* variables (CLI start-up) */
export function createLoggerFromEnv(stateDir: string, env: NodeJS.ProcessEnv = process.env): ProspectorLogger {
  const rawLevel = env.PROSPECTOR_LOG_LEVEL ?? "info";
  const level: LogLevel = isLogLevel(rawLevel) ? rawLevel : "info";
  const dir = env.PROSPECTOR_LOG_DIR ?? path.join(stateDir, "logs");
  const maxSizeStr = env.PROSPECTOR_LOG_MAX_SIZE ?? "10MB";
  const maxRetentionDays = Number(env.PROSPECTOR_LOG_RETENTION_DAYS ?? "7") || DEFAULT_MAX_RETENTION_DAYS;
  const enableConsole = (env.PROSPECTOR_LOG_CONSOLE ?? "true") !== "false";
  const enableFile = (env.PROSPECTOR_LOG_FILE ?? "false") === "true";

  return createLogger({
    level,
    dir,
    maxFileSize: parseSizeToBytes(maxSizeStr),
    maxRetentionDays,
    enableConsole,
    enableFile,
    stateDir,
  });
}
