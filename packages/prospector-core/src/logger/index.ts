/**
 * Logging for the prospecting tools: console (stderr) plus optional daily
 * log files with size rotation and retention cleanup.
 */

export {
  createLogger,
  createLoggerFromEnv,
  formatLogEntry,
  type ProspectorLogger,
  type ChildLogger,
} from "./logger.js";
export type { LogLevel, LogEntry, LogTransport, LoggerOptions } from "./types.js";
export { LOG_LEVEL_WEIGHT, isLogLevel } from "./types.js";
export { createFileTransport, logFileDate, parseSizeToBytes, removeExpiredLogs, type FileTransportOptions } from "./file-transport.js";
