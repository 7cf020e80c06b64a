import type { Tool, ToolCallResult } from "../../types.js";
import type { ScrapeProvider } from "./types.js";

export { FirecrawlScrapeProvider } from "./firecrawl.js";
export type {
  ScrapeProvider,
  ScrapeProviderOptions,
  ScrapeRequest,
  ScrapeResponse,
  ScrapeSuccess,
  ScrapeFailure,
  WebsiteData,
} from "./types.js";

export const SCRAPE_WEBSITE_TOOL_NAME = "scrape_website";

export function createScrapeWebsiteTool(provider: ScrapeProvider): Tool {
  return {
    definition: {
      name: SCRAPE_WEBSITE_TOOL_NAME,
      description:
        "Scrape a web page and return its title, description, language, text and markdown content (truncated to 4000 characters each) and up to 5 links. Use it to read team, leadership or press pages found by web_search.",
      parameters: {
        type: "object",
        properties: {
          website_url: { type: "string", description: "The URL of the website to scrape." },
          session_id: {
            type: "string",
            description: "Session label recorded with the request (default: current conversation).",
          },
        },
        required: ["website_url"],
      },
    },

    async execute(args, context): Promise<ToolCallResult> {
      const start = Date.now();
      context.logger?.debug?.(`${SCRAPE_WEBSITE_TOOL_NAME} called in conversation ${context.conversationId}`);

      const sessionId = typeof args.session_id === "string" && args.session_id ? args.session_id : context.conversationId;
      const response = await provider.scrape(args.website_url, sessionId);

      return {
        id: SCRAPE_WEBSITE_TOOL_NAME,
        name: SCRAPE_WEBSITE_TOOL_NAME,
        success: response.status === "success",
        output: JSON.stringify(response),
        error: response.status === "error" ? response.error_message : undefined,
        durationMs: Date.now() - start,
      };
    },
  };
}
