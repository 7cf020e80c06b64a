export { createLogger, createLoggerFromEnv, formatLogEntry, parseSizeToBytes } from "./logger/index.js";
export type { ProspectorLogger, ChildLogger, LogLevel, LogEntry, LogTransport, LoggerOptions } from "./logger/index.js";

export {
  ConfigError,
  ProspectorConfigSchema,
  loadConfig,
  loadEnvFileIfExists,
  loadEnvFiles,
  type ProspectorConfig,
} from "./config.js";

export { createProspectingTools, type ProspectingToolsOptions } from "./tools.js";
export { runCli, USAGE, EXIT_OK, EXIT_TOOL_ERROR, EXIT_USAGE, type CliIO } from "./cli.js";
