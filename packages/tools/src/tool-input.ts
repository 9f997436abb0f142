export interface ParsedToolInput {
  /** Text handed to `Tool.call`. */
  input: string;
  arguments: Record<string, unknown>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Lowercases, strips wrapping quotes or backticks and joins words with
 * underscores so `"Web Search"` and `web_search` name the same tool.
 */
export function normalizeToolName(name: string): string {
  return name
    .trim()
    .replace(/^["'`]+|["'`]+$/g, "")
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_");
}

/**
 * JSON objects become the call arguments, and their string `input` field
 * (if any) the call text. Anything else is passed through as `{ input }`.
 */
export function parseToolInput(raw: string): ParsedToolInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { input: raw, arguments: { input: raw } };
  }

  if (isRecord(parsed)) {
    const input = typeof parsed.input === "string" ? parsed.input : raw;
    return { input, arguments: parsed };
  }
  if (typeof parsed === "string") {
    return { input: parsed, arguments: { input: parsed } };
  }
  return { input: raw, arguments: { input: raw } };
}
