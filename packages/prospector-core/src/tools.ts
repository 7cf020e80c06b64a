import {
  ToolExecutor,
  TavilySearchProvider,
  FirecrawlScrapeProvider,
  createWebSearchTool,
  createScrapeWebsiteTool,
  WEB_SEARCH_TOOL_NAME,
  SCRAPE_WEBSITE_TOOL_NAME,
  type FetchLike,
} from "@prospector/skills";
import type { ProspectorConfig } from "./config.js";
import type { ProspectorLogger } from "./logger/index.js";

export type ProspectingToolsOptions = {
  /** Stub for tests; defaults to the global fetch */
  fetch?: FetchLike;
};

/** Wire both providers from config and register them as agent tools */
export function createProspectingTools(
  config: ProspectorConfig,
  logger: ProspectorLogger,
  options: ProspectingToolsOptions = {},
): ToolExecutor {
  const search = new TavilySearchProvider({
    apiKey: config.tavilyApiKey,
    endpoint: config.searchEndpoint,
    timeoutMs: config.searchTimeoutMs,
    fetch: options.fetch,
    logger: logger.child(WEB_SEARCH_TOOL_NAME),
  });
  const scrape = new FirecrawlScrapeProvider({
    apiKey: config.firecrawlApiKey,
    endpoint: config.scrapeEndpoint,
    timeoutMs: config.scrapeTimeoutMs,
    fetch: options.fetch,
    logger: logger.child(SCRAPE_WEBSITE_TOOL_NAME),
  });

  const toolsLog = logger.child("tools");
  return new ToolExecutor({
    tools: [createWebSearchTool(search), createScrapeWebsiteTool(scrape)],
    logger: toolsLog,
    auditLogger: entry => {
      const line = `${entry.toolName} ${entry.success ? "ok" : "failed"} in ${entry.durationMs}ms`;
      if (entry.success) {
        toolsLog.info(line, { conversationId: entry.conversationId, arguments: entry.arguments });
      } else {
        toolsLog.warn(line, { conversationId: entry.conversationId, arguments: entry.arguments, error: entry.error });
      }
    },
  });
}
