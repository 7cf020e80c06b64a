import { classifyFetchError, describeError, type ToolErrorKind } from "../../errors.js";
import type { FetchLike, ToolLogger } from "../../types.js";
import { isRecord, stringOr } from "../payload.js";
import { truncateText } from "../truncate.js";
import type {
  ScrapeFailure,
  ScrapeProvider,
  ScrapeProviderOptions,
  ScrapeRequest,
  ScrapeResponse,
  WebsiteData,
} from "./types.js";

const FIRECRAWL_ENDPOINT = "https://api.firecrawl.dev/v1/scrape";
const DEFAULT_TIMEOUT_MS = 45_000;
const DEFAULT_WAIT_FOR_MS = 5_000;
const DEFAULT_UPSTREAM_TIMEOUT_MS = 30_000;
const CONTENT_LIMIT = 4000;
const MAX_LINKS = 5;
const DEFAULT_SESSION_ID = "default_session";
const MISSING = "N/A";

export class FirecrawlScrapeProvider implements ScrapeProvider {
  name = "firecrawl";

  private readonly apiKey?: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly waitForMs: number;
  private readonly upstreamTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly log: ToolLogger;
  private readonly now: () => Date;

  constructor(opts: ScrapeProviderOptions = {}) {
    this.apiKey = opts.apiKey;
    this.endpoint = opts.endpoint ?? FIRECRAWL_ENDPOINT;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.waitForMs = opts.waitForMs ?? DEFAULT_WAIT_FOR_MS;
    this.upstreamTimeoutMs = opts.upstreamTimeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
    this.log = opts.logger ?? console;
    this.now = opts.now ?? (() => new Date());
  }

  async scrape(websiteUrl: unknown, sessionId: unknown = DEFAULT_SESSION_ID): Promise<ScrapeResponse> {
    if (typeof websiteUrl !== "string" || !websiteUrl.trim()) {
      return this.fail("invalid_input", "Invalid website URL provided", String(websiteUrl ?? ""));
    }

    if (!this.apiKey) {
      return this.fail("missing_credential", "Scrape API credential not found (FIRECRAWL_API_KEY)", websiteUrl);
    }

    const request: ScrapeRequest = {
      website_url: websiteUrl,
      session_id: typeof sessionId === "string" && sessionId ? sessionId : DEFAULT_SESSION_ID,
    };
    this.log.info(`Scraping website: ${request.website_url} (session ${request.session_id})`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          url: request.website_url,
          // markdown only, keeps the payload small
          formats: ["markdown"],
          waitFor: this.waitForMs,
          timeout: this.upstreamTimeoutMs,
        }),
        signal: controller.signal,
      });

      const text = await res.text();
      if (res.status !== 200) {
        return this.fail("upstream_http", `API Error ${res.status}: ${text || res.statusText}`, websiteUrl, res.status);
      }

      const payload: unknown = JSON.parse(text);
      if (!isRecord(payload) || payload.success !== true) {
        return this.fail(
          "upstream_unsuccessful",
          "Failed to scrape website: API returned unsuccessful response",
          websiteUrl,
        );
      }

      const result: ScrapeResponse = {
        status: "success",
        website_data: toWebsiteData(request.website_url, payload.data),
        timestamp: this.now().toISOString(),
      };
      this.log.info(`Successfully scraped website: ${websiteUrl}`);
      return result;
    } catch (err) {
      const kind = classifyFetchError(err);
      return this.fail(kind, describeFailure(kind, websiteUrl, err), websiteUrl);
    } finally {
      clearTimeout(timeout);
    }
  }

  private fail(kind: ToolErrorKind, message: string, url: string, httpStatus?: number): ScrapeFailure {
    this.log.error(message, { url });
    return httpStatus === undefined
      ? { status: "error", kind, error_message: message, url }
      : { status: "error", kind, error_message: message, url, http_status: httpStatus };
  }
}

function toWebsiteData(url: string, data: unknown): WebsiteData {
  const body: Record<string, unknown> = isRecord(data) ? data : {};
  const metadata: Record<string, unknown> = isRecord(body.metadata) ? body.metadata : {};
  const links = Array.isArray(body.links)
    ? body.links.filter((l): l is string => typeof l === "string").slice(0, MAX_LINKS)
    : [];

  return {
    basic_info: {
      url,
      title: stringOr(metadata.title, MISSING),
      description: stringOr(metadata.description, MISSING),
      language: stringOr(metadata.language, MISSING),
    },
    content: {
      text: truncateText(stringOr(body.content, MISSING), CONTENT_LIMIT),
      markdown: truncateText(stringOr(body.markdown, MISSING), CONTENT_LIMIT),
    },
    links,
  };
}

function describeFailure(kind: ToolErrorKind, url: string, err: unknown): string {
  const detail = describeError(err);
  switch (kind) {
    case "timeout":
      return `Timeout while scraping website: ${url}`;
    case "network":
      return `Request failed for ${url}: ${detail}`;
    case "malformed_response":
      return `Invalid JSON response for ${url}: ${detail}`;
    default:
      return `Unexpected error scraping ${url}: ${detail}`;
  }
}
