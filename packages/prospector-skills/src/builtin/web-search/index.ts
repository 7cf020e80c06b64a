import type { Tool, ToolCallResult } from "../../types.js";
import type { SearchProvider } from "./types.js";

export { TavilySearchProvider } from "./tavily.js";
export type {
  SearchDepth,
  SearchProvider,
  SearchProviderOptions,
  SearchRequest,
  SearchResponse,
  SearchResult,
  SearchSuccess,
  SearchFailure,
} from "./types.js";

export const WEB_SEARCH_TOOL_NAME = "web_search";

export function createWebSearchTool(provider: SearchProvider): Tool {
  return {
    definition: {
      name: WEB_SEARCH_TOOL_NAME,
      description:
        "Search the web. Returns up to max_results ranked results (title, url, a content excerpt, relevance score) and a short synthesized answer. Use it to find people, roles and company pages.",
      parameters: {
        type: "object",
        properties: {
          query: { type: "string", description: "The search query." },
          search_depth: {
            type: "string",
            description: "Search depth (default: basic).",
            enum: ["basic", "advanced"],
          },
          max_results: {
            type: "number",
            description: "Maximum number of results to return (default: 5).",
          },
        },
        required: ["query"],
      },
    },

    async execute(args, context): Promise<ToolCallResult> {
      const start = Date.now();
      context.logger?.debug?.(`${WEB_SEARCH_TOOL_NAME} called in conversation ${context.conversationId}`);

      const response = await provider.search(args.query, args.search_depth, args.max_results);

      return {
        id: WEB_SEARCH_TOOL_NAME,
        name: WEB_SEARCH_TOOL_NAME,
        success: response.status === "success",
        output: JSON.stringify(response),
        error: response.status === "error" ? response.error_message : undefined,
        durationMs: Date.now() - start,
      };
    },
  };
}
