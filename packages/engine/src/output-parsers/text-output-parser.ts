import { UnparsableOutputError } from "@promptweave/types";

/** Post-processes the raw text of a plain chain call. */
export interface TextOutputParser {
  parse(text: string): string;
}

export interface SimpleParserOptions {
  trim?: boolean;
}

export class SimpleParser implements TextOutputParser {
  private readonly trim: boolean;

  constructor(options: SimpleParserOptions = {}) {
    this.trim = options.trim ?? true;
  }

  parse(text: string): string {
    return this.trim ? text.trim() : text;
  }
}

const FENCED_BLOCK = /```(?:[\w-]+)?[^\S\n]*\n?([\s\S]*?)\n?[^\S\n]*```/;

/** Extracts the body of the first fenced code block. */
export class MarkdownParser implements TextOutputParser {
  parse(text: string): string {
    const match = FENCED_BLOCK.exec(text);
    if (!match) {
      throw new UnparsableOutputError(text, "No fenced code block found");
    }
    return (match[1] ?? "").trim();
  }
}

export function extractFencedBlock(text: string): string | undefined {
  return FENCED_BLOCK.exec(text)?.[1];
}
