/**
 * Parses JSON that may have been cut off mid-stream by closing any open
 * string, object or array and dropping trailing commas. Returns undefined
 * when no repair helps.
 */
export function parsePartialJson(text: string): unknown {
  const source = text.trim();
  if (!source) {
    return undefined;
  }

  try {
    return JSON.parse(source);
  } catch {
    // fall through to repair
  }

  const closers: string[] = [];
  let inString = false;
  let escaped = false;
  let repaired = "";

  for (const char of source) {
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      } else if (char === "\n") {
        repaired += "\\n";
        continue;
      }
      repaired += char;
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      closers.push("}");
    } else if (char === "[") {
      closers.push("]");
    } else if (char === "}" || char === "]") {
      if (closers[closers.length - 1] !== char) {
        return undefined;
      }
      closers.pop();
      repaired = repaired.replace(/,\s*$/, "");
    }
    repaired += char;
  }

  if (escaped) {
    repaired = repaired.slice(0, -1);
  }
  if (inString) {
    repaired += '"';
  }
  repaired = repaired.replace(/[,:\s]+$/, "");
  repaired += closers.reverse().join("");

  try {
    return JSON.parse(repaired);
  } catch {
    return undefined;
  }
}
