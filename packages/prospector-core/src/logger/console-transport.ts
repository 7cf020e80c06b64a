import type { LogEntry, LogTransport } from "./types.js";

const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  gray: "\x1b[90m",
} as const;

function colorize(level: LogEntry["level"], text: string): string {
  switch (level) {
    case "error":
      return `${COLORS.red}${text}${COLORS.reset}`;
    case "warn":
      return `${COLORS.yellow}${text}${COLORS.reset}`;
    case "info":
      return `${COLORS.blue}${text}${COLORS.reset}`;
    case "debug":
      return `${COLORS.gray}${text}${COLORS.reset}`;
    default:
      return text;
  }
}

/**
 * Everything goes to stderr: stdout carries the CLI's JSON output.
 */
export function createConsoleTransport(): LogTransport {
  return {
    write(entry: LogEntry, formatted: string) {
      process.stderr.write(colorize(entry.level, formatted) + "\n");
    },
  };
}
