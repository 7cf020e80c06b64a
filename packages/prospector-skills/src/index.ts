export type {
  FetchLike,
  JsonObject,
  Tool,
  ToolDefinition,
  ToolParameterSchema,
  ToolCallRequest,
  ToolCallResult,
  ToolContext,
  ToolLogger,
  ToolAuditLog,
} from "./types.js";

export { ToolExecutor, sanitizeArgs } from "./executor.js";
export type { ToolExecutorOptions, OpenAIToolDefinition } from "./executor.js";

export { classifyFetchError, describeError, isRetryableError, type ToolErrorKind } from "./errors.js";
export { TRUNCATION_MARKER, truncateText } from "./builtin/truncate.js";

// web search
export {
  createWebSearchTool,
  TavilySearchProvider,
  WEB_SEARCH_TOOL_NAME,
  type SearchDepth,
  type SearchProvider,
  type SearchProviderOptions,
  type SearchRequest,
  type SearchResponse,
  type SearchResult,
  type SearchSuccess,
  type SearchFailure,
} from "./builtin/web-search/index.js";

// scraping
export {
  createScrapeWebsiteTool,
  FirecrawlScrapeProvider,
  SCRAPE_WEBSITE_TOOL_NAME,
  type ScrapeProvider,
  type ScrapeProviderOptions,
  type ScrapeRequest,
  type ScrapeResponse,
  type ScrapeSuccess,
  type ScrapeFailure,
  type WebsiteData,
} from "./builtin/scrape/index.js";
