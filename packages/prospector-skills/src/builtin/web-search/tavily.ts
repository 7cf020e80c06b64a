import { classifyFetchError, describeError, type ToolErrorKind } from "../../errors.js";
import type { FetchLike, ToolLogger } from "../../types.js";
import { isRecord, numberOr, stringOr } from "../payload.js";
import { truncateText } from "../truncate.js";
import {
  SEARCH_DEPTHS,
  type SearchDepth,
  type SearchFailure,
  type SearchProvider,
  type SearchProviderOptions,
  type SearchRequest,
  type SearchResponse,
  type SearchResult,
} from "./types.js";

const TAVILY_ENDPOINT = "https://api.tavily.com/search";
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RESULTS = 5;
const CONTENT_LIMIT = 1000;
const ANSWER_LIMIT = 500;

export class TavilySearchProvider implements SearchProvider {
  name = "tavily";

  private readonly apiKey?: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly log: ToolLogger;

  constructor(opts: SearchProviderOptions = {}) {
    this.apiKey = opts.apiKey;
    this.endpoint = opts.endpoint ?? TAVILY_ENDPOINT;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
    this.log = opts.logger ?? console;
  }

  async search(
    query: unknown,
    searchDepth: unknown = "basic",
    maxResults: unknown = DEFAULT_MAX_RESULTS,
  ): Promise<SearchResponse> {
    if (typeof query !== "string" || !query.trim()) {
      return this.fail("invalid_input", "Query must be a non-empty string", query);
    }

    const max = parseMaxResults(maxResults);
    if (max === null) {
      return this.fail("invalid_input", "max_results must be a positive integer", query);
    }

    let depth: SearchDepth = "basic";
    if (isSearchDepth(searchDepth)) {
      depth = searchDepth;
    } else {
      this.log.warn(`Invalid search_depth '${String(searchDepth)}', using 'basic'`);
    }

    if (!this.apiKey) {
      return this.fail("missing_credential", "Search API credential not found (TAVILY_API_KEY)", query);
    }

    const request: SearchRequest = { query, search_depth: depth, max_results: max };
    this.log.info(`Performing web search: ${query}`);

    try {
      const res = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(buildPayload(request)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      const text = await res.text();
      if (res.status !== 200) {
        return this.fail("upstream_http", `API Error ${res.status}: ${text || res.statusText}`, query, res.status);
      }

      const data: unknown = JSON.parse(text);
      return {
        status: "success",
        query,
        results: normalizeResults(data),
        answer: normalizeAnswer(data),
      };
    } catch (err) {
      const kind = classifyFetchError(err);
      return this.fail(kind, describeFailure(kind, query, err), query);
    }
  }

  private fail(kind: ToolErrorKind, message: string, query: unknown, httpStatus?: number): SearchFailure {
    this.log.error(message, { query });
    return httpStatus === undefined
      ? { status: "error", kind, error_message: message }
      : { status: "error", kind, error_message: message, http_status: httpStatus };
  }
}

function isSearchDepth(value: unknown): value is SearchDepth {
  return typeof value === "string" && SEARCH_DEPTHS.some(d => d === value);
}

/** Numeric strings such as "3" are coerced */
function parseMaxResults(value: unknown): number | null {
  let n: number;
  if (typeof value === "number") {
    n = value;
  } else if (typeof value === "string" && /^\s*-?\d+\s*$/.test(value)) {
    n = parseInt(value, 10);
  } else {
    return null;
  }
  return Number.isInteger(n) && n > 0 ? n : null;
}

function buildPayload(request: SearchRequest): Record<string, unknown> {
  return {
    query: request.query,
    topic: "general",
    search_depth: request.search_depth,
    chunks_per_source: 2,
    max_results: request.max_results,
    time_range: null,
    days: 7,
    include_answer: true,
    include_raw_content: false,
    include_images: false,
    include_image_descriptions: false,
    include_domains: [],
    exclude_domains: [],
    country: null,
  };
}

function normalizeResults(data: unknown): SearchResult[] {
  if (!isRecord(data) || !Array.isArray(data.results)) return [];
  const results: SearchResult[] = [];
  for (const item of data.results) {
    if (!isRecord(item)) continue;
    results.push({
      title: stringOr(item.title, ""),
      url: stringOr(item.url, ""),
      content: truncateText(stringOr(item.content, ""), CONTENT_LIMIT),
      score: numberOr(item.score, 0),
    });
  }
  return results;
}

function normalizeAnswer(data: unknown): string {
  if (!isRecord(data)) return "";
  return truncateText(stringOr(data.answer, ""), ANSWER_LIMIT);
}

function describeFailure(kind: ToolErrorKind, query: string, err: unknown): string {
  const detail = describeError(err);
  switch (kind) {
    case "timeout":
      return `Timeout while searching: ${query}`;
    case "network":
      return `Search request failed for "${query}": ${detail}`;
    case "malformed_response":
      return `Invalid JSON response for search "${query}": ${detail}`;
    default:
      return `Error in web search: ${detail}`;
  }
}
