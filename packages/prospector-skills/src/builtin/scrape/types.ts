import type { ToolErrorKind } from "../../errors.js";
import type { FetchLike, ToolLogger } from "../../types.js";

export interface ScrapeRequest {
  website_url: string;
  /** Opaque label, logged only */
  session_id: string;
}

export interface WebsiteData {
  basic_info: {
    url: string;
    title: string;
    description: string;
    language: string;
  };
  content: {
    text: string;
    markdown: string;
  };
  links: string[];
}

export type ScrapeSuccess = {
  status: "success";
  website_data: WebsiteData;
  timestamp: string;
};

export type ScrapeFailure = {
  status: "error";
  kind: ToolErrorKind;
  error_message: string;
  url: string;
  http_status?: number;
};

export type ScrapeResponse = ScrapeSuccess | ScrapeFailure;

export interface ScrapeProviderOptions {
  apiKey?: string;
  endpoint?: string;
  /** Client-side request timeout */
  timeoutMs?: number;
  /** Render wait requested from the upstream */
  waitForMs?: number;
  /** Timeout the upstream applies to its own page load */
  upstreamTimeoutMs?: number;
  fetch?: FetchLike;
  logger?: ToolLogger;
  now?: () => Date;
}

export interface ScrapeProvider {
  name: string;
  scrape(websiteUrl: unknown, sessionId?: unknown): Promise<ScrapeResponse>;
}
