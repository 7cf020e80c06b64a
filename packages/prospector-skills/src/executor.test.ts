import { describe, it, expect, vi } from "vitest";
import { ToolExecutor, sanitizeArgs } from "./executor.js";
import { createWebSearchTool } from "./builtin/web-search/index.js";
import { createScrapeWebsiteTool } from "./builtin/scrape/index.js";
import { TRUNCATION_MARKER } from "./builtin/truncate.js";
import type { SearchProvider, SearchResponse } from "./builtin/web-search/types.js";
import type { ScrapeProvider, ScrapeResponse } from "./builtin/scrape/types.js";
import type { Tool, ToolAuditLog } from "./types.js";

const searchSuccess: SearchResponse = {
  status: "success",
  query: "CIO Saudi Aramco",
  results: [{ title: "CIO", url: "https://example.com/cio", content: "profile", score: 0.8 }],
  answer: "",
};

const scrapeFailure: ScrapeResponse = {
  status: "error",
  kind: "missing_credential",
  error_message: "Scrape API credential not found (FIRECRAWL_API_KEY)",
  url: "https://example.com",
};

function createFakeProviders() {
  const search = vi.fn(async (_query: unknown, _depth?: unknown, _max?: unknown) => searchSuccess);
  const scrape = vi.fn(async (_url: unknown, _session?: unknown) => scrapeFailure);
  const searchProvider: SearchProvider = { name: "fake-search", search };
  const scrapeProvider: ScrapeProvider = { name: "fake-scrape", scrape };
  return { search, scrape, searchProvider, scrapeProvider };
}

describe("ToolExecutor", () => {
  it("should expose function-calling definitions for both tools", () => {
    const { searchProvider, scrapeProvider } = createFakeProviders();
    const executor = new ToolExecutor({
      tools: [createWebSearchTool(searchProvider), createScrapeWebsiteTool(scrapeProvider)],
    });

    const defs = executor.getDefinitions();
    expect(defs.map(d => d.function.name)).toEqual(["web_search", "scrape_website"]);
    expect(defs[0].type).toBe("function");
    expect(defs[0].function.parameters).toMatchObject({ required: ["query"] });
    expect(defs[1].function.parameters).toMatchObject({ required: ["website_url"] });
  });

  it("should pass search arguments through and serialize the response", async () => {
    const { search, searchProvider } = createFakeProviders();
    const executor = new ToolExecutor({ tools: [createWebSearchTool(searchProvider)] });

    const result = await executor.execute(
      { id: "call_1", name: "web_search", arguments: { query: "CIO Saudi Aramco", search_depth: "advanced", max_results: 3 } },
      "conv-1",
    );

    expect(search).toHaveBeenCalledWith("CIO Saudi Aramco", "advanced", 3);
    expect(result.id).toBe("call_1");
    expect(result.success).toBe(true);
    expect(result.error).toBeUndefined();
    expect(JSON.parse(result.output)).toEqual(searchSuccess);
  });

  it("should report an adapter error as a failed result", async () => {
    const { scrapeProvider } = createFakeProviders();
    const executor = new ToolExecutor({ tools: [createScrapeWebsiteTool(scrapeProvider)] });

    const result = await executor.execute(
      { id: "call_2", name: "scrape_website", arguments: { website_url: "https://example.com" } },
      "conv-1",
    );

    expect(result.success).toBe(false);
    expect(result.error).toBe("Scrape API credential not found (FIRECRAWL_API_KEY)");
    expect(JSON.parse(result.output)).toEqual(scrapeFailure);
  });

  it("should default the scrape session label to the conversation id", async () => {
    const { scrape, scrapeProvider } = createFakeProviders();
    const executor = new ToolExecutor({ tools: [createScrapeWebsiteTool(scrapeProvider)] });

    await executor.execute({ id: "a", name: "scrape_website", arguments: { website_url: "https://example.com" } }, "conv-9");
    await executor.execute(
      { id: "b", name: "scrape_website", arguments: { website_url: "https://example.com", session_id: "lead-42" } },
      "conv-9",
    );

    expect(scrape.mock.calls[0]).toEqual(["https://example.com", "conv-9"]);
    expect(scrape.mock.calls[1]).toEqual(["https://example.com", "lead-42"]);
  });

  it("should reject unknown tools", async () => {
    const executor = new ToolExecutor({ tools: [] });
    const result = await executor.execute({ id: "x", name: "send_email", arguments: {} }, "conv-1");
    expect(result.success).toBe(false);
    expect(result.error).toBe("Unknown tool: send_email");
  });

  it("should turn a thrown error into a failed result", async () => {
    const broken: Tool = {
      definition: { name: "broken", description: "always throws", parameters: { type: "object", properties: {} } },
      async execute() {
        throw new Error("kaput");
      },
    };
    const executor = new ToolExecutor({ tools: [broken] });
    const result = await executor.execute({ id: "x", name: "broken", arguments: {} }, "conv-1");
    expect(result).toMatchObject({ id: "x", name: "broken", success: false, output: "", error: "kaput" });
  });

  it("should audit calls with redacted arguments and capped output", async () => {
    const { searchProvider } = createFakeProviders();
    const logs: ToolAuditLog[] = [];
    const executor = new ToolExecutor({
      tools: [createWebSearchTool(searchProvider)],
      auditLogger: log => logs.push(log),
    });

    await executor.execute(
      { id: "c", name: "web_search", arguments: { query: "CIO Saudi Aramco", api_key: "test-secret" } },
      "conv-7",
    );

    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      conversationId: "conv-7",
      toolName: "web_search",
      arguments: { query: "CIO Saudi Aramco", api_key: "[REDACTED]" },
      success: true,
    });
    expect(logs[0].output).toBe(JSON.stringify(searchSuccess));
  });

  it("should cap audited output at 200 characters with the truncation marker", async () => {
    const verbose: Tool = {
      definition: { name: "verbose", description: "long output", parameters: { type: "object", properties: {} } },
      async execute() {
        return { id: "", name: "verbose", success: true, output: "z".repeat(250), durationMs: 0 };
      },
    };
    const logs: ToolAuditLog[] = [];
    const executor = new ToolExecutor({ tools: [verbose], auditLogger: log => logs.push(log) });

    const result = await executor.execute({ id: "v", name: "verbose", arguments: {} }, "conv-8");

    expect(result.output).toBe("z".repeat(250));
    expect(logs[0].output).toBe("z".repeat(200) + TRUNCATION_MARKER);
  });

  it("should pass its logger to the tools", async () => {
    const { searchProvider } = createFakeProviders();
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const executor = new ToolExecutor({ tools: [createWebSearchTool(searchProvider)], logger });

    await executor.execute({ id: "d", name: "web_search", arguments: { query: "CIO" } }, "conv-3");

    expect(logger.debug).toHaveBeenCalledWith("web_search called in conversation conv-3");
  });

  it("should warn when a tool is registered twice", () => {
    const { searchProvider } = createFakeProviders();
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const executor = new ToolExecutor({ tools: [createWebSearchTool(searchProvider)], logger });

    executor.registerTool(createWebSearchTool(searchProvider));

    expect(logger.warn).toHaveBeenCalledWith('[ToolExecutor] tool "web_search" already registered, overwriting');
    expect(executor.getToolCount()).toBe(1);
    expect(executor.unregisterTool("web_search")).toBe(true);
    expect(executor.hasTool("web_search")).toBe(false);
  });

  it("should run calls in parallel and keep request order", async () => {
    const { searchProvider, scrapeProvider } = createFakeProviders();
    const executor = new ToolExecutor({
      tools: [createWebSearchTool(searchProvider), createScrapeWebsiteTool(scrapeProvider)],
    });

    const results = await executor.executeAll(
      [
        { id: "1", name: "scrape_website", arguments: { website_url: "https://example.com" } },
        { id: "2", name: "web_search", arguments: { query: "CIO" } },
      ],
      "conv-1",
    );

    expect(results.map(r => [r.id, r.success])).toEqual([["1", false], ["2", true]]);
  });
});

describe("sanitizeArgs", () => {
  it("should redact credential-like keys only", () => {
    expect(sanitizeArgs({ query: "q", token: "t", apiKey: "k", session_id: "s" })).toEqual({
      query: "q",
      token: "[REDACTED]",
      apiKey: "[REDACTED]",
      session_id: "s",
    });
  });
});
