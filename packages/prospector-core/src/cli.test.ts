import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { runCli, USAGE, EXIT_OK, EXIT_TOOL_ERROR, EXIT_USAGE } from "./cli.js";

describe("prospect CLI", () => {
  let dir: string;
  let out: string[];
  let err: string[];

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "prospector-cli-"));
    out = [];
    err = [];
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function run(argv: string[], env: NodeJS.ProcessEnv = {}, fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) => new Response("{}"))) {
    return runCli(argv, {
      env: { PROSPECTOR_LOG_CONSOLE: "false", PROSPECTOR_STATE_DIR: dir, ...env },
      cwd: dir,
      stdout: text => out.push(text),
      stderr: text => err.push(text),
      fetch: fetchImpl,
    });
  }

  it("should print the tool definitions", async () => {
    const code = await run(["tools"]);
    expect(code).toBe(EXIT_OK);
    const defs = JSON.parse(out.join(""));
    expect(defs.map((d: { function: { name: string } }) => d.function.name)).toEqual(["web_search", "scrape_website"]);
  });

  it("should run a search and print the response", async () => {
    const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) =>
      new Response(
        JSON.stringify({
          answer: "The CIO is Jane Doe.",
          results: [{ title: "CIO", url: "https://example.com/cio", content: "Jane Doe", score: 0.9 }],
        }),
      ),
    );

    const code = await run(["search", "CIO", "Saudi", "Aramco", "--max", "3"], { TAVILY_API_KEY: "test-secret" }, fetchImpl);

    expect(code).toBe(EXIT_OK);
    expect(JSON.parse(out.join(""))).toEqual({
      status: "success",
      query: "CIO Saudi Aramco",
      results: [{ title: "CIO", url: "https://example.com/cio", content: "Jane Doe", score: 0.9 }],
      answer: "The CIO is Jane Doe.",
    });
    expect(JSON.parse(String(fetchImpl.mock.calls[0][1]?.body)).max_results).toBe(3);
  });

  it("should exit 1 and make no request when the scrape credential is missing", async () => {
    const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) => new Response("{}"));

    const code = await run(["scrape", "https://example.com"], {}, fetchImpl);

    expect(code).toBe(EXIT_TOOL_ERROR);
    expect(JSON.parse(out.join(""))).toEqual({
      status: "error",
      kind: "missing_credential",
      error_message: "Scrape API credential not found (FIRECRAWL_API_KEY)",
      url: "https://example.com",
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("should pick credentials up from a .env file in the working directory", async () => {
    await fs.writeFile(path.join(dir, ".env"), "FIRECRAWL_API_KEY=test-secret\n");
    const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) =>
      new Response(JSON.stringify({ success: true, data: { markdown: "# Team" } })),
    );

    const code = await run(["scrape", "https://example.com/team", "--session", "lead-1"], {}, fetchImpl);

    expect(code).toBe(EXIT_OK);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][1]?.headers).toMatchObject({ Authorization: "Bearer test-secret" });
  });

  it("should print usage for an unknown command", async () => {
    const code = await run(["enrich", "Saudi Aramco"]);
    expect(code).toBe(EXIT_USAGE);
    expect(err.join("")).toBe(`${USAGE}\n`);
  });

  it("should print usage for an unknown option", async () => {
    const code = await run(["search", "CIO", "--verbose"]);
    expect(code).toBe(EXIT_USAGE);
    expect(err.join("")).toContain(USAGE);
  });

  it("should exit 1 on invalid configuration", async () => {
    const code = await run(["tools"], { PROSPECTOR_SEARCH_ENDPOINT: "nope" });
    expect(code).toBe(EXIT_TOOL_ERROR);
    expect(err.join("")).toContain("PROSPECTOR_SEARCH_ENDPOINT: must be a valid URL");
  });
});
