import { MalformedTemplateError } from "@promptweave/types";

export type FStringSegment =
  | { type: "text"; value: string }
  | { type: "variable"; name: string };

const IDENTIFIER = /^\w+$/;

/**
 * Splits an f-string template into text and `{name}` segments. `{{` and
 * `}}` stand for literal braces.
 */
export function parseFString(template: string): FStringSegment[] {
  const segments: FStringSegment[] = [];
  let text = "";
  let index = 0;

  const flushText = () => {
    if (text) {
      segments.push({ type: "text", value: text });
      text = "";
    }
  };

  while (index < template.length) {
    const char = template[index];
    const next = template[index + 1];

    if (char === "{" && next === "{") {
      text += "{";
      index += 2;
      continue;
    }
    if (char === "}" && next === "}") {
      text += "}";
      index += 2;
      continue;
    }
    if (char === "}") {
      throw new MalformedTemplateError(template, "unmatched closing brace", index);
    }
    if (char !== "{") {
      text += char;
      index += 1;
      continue;
    }

    const close = template.indexOf("}", index + 1);
    if (close === -1) {
      throw new MalformedTemplateError(template, "unclosed placeholder", index);
    }
    const name = template.slice(index + 1, close);
    if (name.includes("{")) {
      throw new MalformedTemplateError(template, "nested placeholders are not supported", index);
    }
    if (!IDENTIFIER.test(name)) {
      throw new MalformedTemplateError(
        template,
        name.trim() === ""
          ? "empty placeholder"
          : `unsupported placeholder expression "${name}"`,
        index
      );
    }

    flushText();
    segments.push({ type: "variable", name });
    index = close + 1;
  }

  flushText();
  return segments;
}

export function fStringVariables(segments: readonly FStringSegment[]): string[] {
  const names = new Set<string>();
  for (const segment of segments) {
    if (segment.type === "variable") {
      names.add(segment.name);
    }
  }
  return Array.from(names);
}
