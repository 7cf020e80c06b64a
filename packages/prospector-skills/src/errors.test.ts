import { describe, it, expect } from "vitest";
import { classifyFetchError, describeError, isRetryableError } from "./errors.js";
import { TRUNCATION_MARKER, truncateText } from "./builtin/truncate.js";

describe("classifyFetchError", () => {
  it("should classify aborts and timeouts as timeout", () => {
    expect(classifyFetchError(Object.assign(new Error("aborted"), { name: "AbortError" }))).toBe("timeout");
    expect(classifyFetchError(Object.assign(new Error("timed out"), { name: "TimeoutError" }))).toBe("timeout");
  });

  it("should classify JSON syntax errors as malformed_response", () => {
    let thrown: unknown;
    try {
      JSON.parse("{");
    } catch (err) {
      thrown = err;
    }
    expect(classifyFetchError(thrown)).toBe("malformed_response");
  });

  it("should classify fetch TypeErrors as network", () => {
    expect(classifyFetchError(new TypeError("fetch failed"))).toBe("network");
  });

  it("should fall back to unexpected", () => {
    expect(classifyFetchError(new RangeError("x"))).toBe("unexpected");
    expect(classifyFetchError("plain string")).toBe("unexpected");
  });
});

describe("isRetryableError", () => {
  it("should retry transport failures and upstream 5xx/429 only", () => {
    expect(isRetryableError("timeout")).toBe(true);
    expect(isRetryableError("network")).toBe(true);
    expect(isRetryableError("upstream_http", 503)).toBe(true);
    expect(isRetryableError("upstream_http", 429)).toBe(true);
    expect(isRetryableError("upstream_http", 401)).toBe(false);
    expect(isRetryableError("invalid_input")).toBe(false);
    expect(isRetryableError("missing_credential")).toBe(false);
    expect(isRetryableError("upstream_unsuccessful")).toBe(false);
  });
});

describe("describeError", () => {
  it("should append the cause message", () => {
    expect(describeError(new Error("fetch failed", { cause: new Error("ECONNRESET") }))).toBe("fetch failed (ECONNRESET)");
    expect(describeError(42)).toBe("42");
  });
});

describe("truncateText", () => {
  it("should leave text at or under the limit untouched", () => {
    expect(truncateText("abc", 3)).toBe("abc");
    expect(truncateText("", 3)).toBe("");
  });

  it("should cut at the limit and append the marker", () => {
    expect(truncateText("abcdef", 3)).toBe("abc... (content truncated)");
    expect(TRUNCATION_MARKER).toBe("... (content truncated)");
  });

  it("should not split a surrogate pair at the limit", () => {
    const text = "a".repeat(999) + "😀" + "tail";
    const out = truncateText(text, 1000);
    expect(out).toBe("a".repeat(999) + TRUNCATION_MARKER);
    expect(out.charCodeAt(998)).toBe(0x61);
  });

  it("should keep a pair that ends exactly at the limit", () => {
    expect(truncateText("ab😀cd", 4)).toBe("ab😀" + TRUNCATION_MARKER);
  });
});
