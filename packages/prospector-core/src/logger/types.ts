/**
 * Logger types: four levels, console and file output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_WEIGHT, value);
}

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  module: string;
  message: string;
  /** Serialized as JSON after the message */
  data?: unknown;
}

export interface LogTransport {
  write(entry: LogEntry, formatted: string): void;
  close?(): void | Promise<void>;
}

export interface LoggerOptions {
  /** Entries below this level are dropped */
  level?: LogLevel;
  /** Log directory for the file transport */
  dir?: string;
  /** Rotate when a file grows past this many bytes */
  maxFileSize?: number;
  maxRetentionDays?: number;
  enableConsole?: boolean;
  enableFile?: boolean;
  defaultModule?: string;
  /** Extra transports, written after console and file */
  transports?: LogTransport[];
}
