/** Suffix appended when a payload is cut at its length limit */
export const TRUNCATION_MARKER = "... (content truncated)";

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Cut at `limit` UTF-16 units, backing off one unit rather than splitting a surrogate pair */
export function truncateText(text: string, limit: number): string {
  if (text.length <= limit) return text;
  const end = limit > 0 && isHighSurrogate(text.charCodeAt(limit - 1)) ? limit - 1 : limit;
  return text.slice(0, end) + TRUNCATION_MARKER;
}
