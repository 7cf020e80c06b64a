import { parseArgs } from "node:util";
import crypto from "node:crypto";
import {
  SCRAPE_WEBSITE_TOOL_NAME,
  WEB_SEARCH_TOOL_NAME,
  type FetchLike,
  type JsonObject,
} from "@prospector/skills";
import { ConfigError, loadConfig, loadEnvFiles, type ProspectorConfig } from "./config.js";
import { createLoggerFromEnv } from "./logger/index.js";
import { createProspectingTools } from "./tools.js";

export const USAGE = `Usage:
  prospect tools
  prospect search <query> [--depth basic|advanced] [--max N]
  prospect scrape <url> [--session ID]`;

export const EXIT_OK = 0;
export const EXIT_TOOL_ERROR = 1;
export const EXIT_USAGE = 2;

export type CliIO = {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  fetch?: FetchLike;
};

type Invocation = { tool: string; arguments: JsonObject };

function toInvocation(command: string | undefined, rest: string[], values: { depth?: string; max?: string; session?: string }): Invocation | null {
  if (command === "search" && rest.length > 0) {
    const args: JsonObject = { query: rest.join(" ") };
    if (values.depth !== undefined) args.search_depth = values.depth;
    if (values.max !== undefined) args.max_results = values.max;
    return { tool: WEB_SEARCH_TOOL_NAME, arguments: args };
  }
  if (command === "scrape" && rest.length === 1) {
    const args: JsonObject = { website_url: rest[0] };
    if (values.session !== undefined) args.session_id = values.session;
    return { tool: SCRAPE_WEBSITE_TOOL_NAME, arguments: args };
  }
  return null;
}

/** Run one CLI command and return the process exit code */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n${USAGE}\n`);
    return EXIT_USAGE;
  }
  const [command, ...rest] = parsed.positionals;

  loadEnvFiles(io.cwd, io.env);
  let config: ProspectorConfig;
  try {
    config = loadConfig(io.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.stderr(`${err.message}\n`);
      return EXIT_TOOL_ERROR;
    }
    throw err;
  }

  const logger = createLoggerFromEnv(config.stateDir, io.env);
  const log = logger.child("prospect");
  try {
    log.info(config.tavilyApiKey ? "Search API key found" : "Search API key not found (TAVILY_API_KEY)");
    log.info(config.firecrawlApiKey ? "Scrape API key found" : "Scrape API key not found (FIRECRAWL_API_KEY)");

    const executor = createProspectingTools(config, logger, { fetch: io.fetch });

    if (command === "tools") {
      io.stdout(JSON.stringify(executor.getDefinitions(), null, 2) + "\n");
      return EXIT_OK;
    }

    const invocation = toInvocation(command, rest, parsed.values);
    if (!invocation) {
      io.stderr(`${USAGE}\n`);
      return EXIT_USAGE;
    }

    const result = await executor.execute(
      { id: crypto.randomUUID(), name: invocation.tool, arguments: invocation.arguments },
      `cli-${process.pid}`,
    );
    io.stdout((result.output || JSON.stringify({ status: "error", error_message: result.error })) + "\n");
    return result.success ? EXIT_OK : EXIT_TOOL_ERROR;
  } finally {
    await logger.close();
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      depth: { type: "string" },
      max: { type: "string" },
      session: { type: "string" },
    },
  });
}
