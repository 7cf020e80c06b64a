/**
 * Failure kinds reported by the adapters.
 *
 * Every adapter failure is returned as `{ status: "error", kind, error_message }`;
 * nothing is thrown past the adapter boundary. The kind lets the agent tell a
 * retryable failure (timeout, network, upstream 5xx) from one that will fail
 * again with the same input.
 */
export type ToolErrorKind =
  | "invalid_input"
  | "missing_credential"
  | "upstream_http"
  | "upstream_unsuccessful"
  | "timeout"
  | "network"
  | "malformed_response"
  | "unexpected";

export function isRetryableError(kind: ToolErrorKind, httpStatus?: number): boolean {
  switch (kind) {
    case "timeout":
    case "network":
      return true;
    case "upstream_http":
      return httpStatus !== undefined && (httpStatus === 429 || httpStatus >= 500);
    default:
      return false;
  }
}

/** Map a value thrown while talking to an upstream API to a failure kind */
export function classifyFetchError(err: unknown): ToolErrorKind {
  if (err instanceof Error) {
    // AbortSignal.timeout() rejects with TimeoutError, a manual abort with AbortError
    if (err.name === "TimeoutError" || err.name === "AbortError") return "timeout";
    if (err instanceof SyntaxError) return "malformed_response";
    // undici reports DNS/connect/reset failures as `TypeError: fetch failed`
    if (err instanceof TypeError) return "network";
  }
  return "unexpected";
}

export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause instanceof Error ? err.cause.message : undefined;
  return cause ? `${err.message} (${cause})` : err.message;
}
