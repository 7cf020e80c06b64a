import type { ToolErrorKind } from "../../errors.js";
import type { FetchLike, ToolLogger } from "../../types.js";

export type SearchDepth = "basic" | "advanced";

export const SEARCH_DEPTHS: readonly SearchDepth[] = ["basic", "advanced"];

export interface SearchRequest {
  query: string;
  search_depth: SearchDepth;
  max_results: number;
}

export interface SearchResult {
  title: string;
  url: string;
  content: string;
  score: number;
}

export type SearchSuccess = {
  status: "success";
  query: string;
  /** Upstream ranking order */
  results: SearchResult[];
  answer: string;
};

export type SearchFailure = {
  status: "error";
  kind: ToolErrorKind;
  error_message: string;
  http_status?: number;
};

export type SearchResponse = SearchSuccess | SearchFailure;

export interface SearchProviderOptions {
  apiKey?: string;
  endpoint?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: ToolLogger;
}

export interface SearchProvider {
  name: string;
  search(query: unknown, searchDepth?: unknown, maxResults?: unknown): Promise<SearchResponse>;
}
