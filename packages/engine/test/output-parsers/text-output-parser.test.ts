import { describe, expect, it } from "vitest";
import { UnparsableOutputError } from "@promptweave/types";
import { parsePartialJson } from "../../src/output-parsers/partial-json";
import { MarkdownParser, SimpleParser } from "../../src/output-parsers/text-output-parser";

describe("SimpleParser", () => {
  it("trims by default", () => {
    expect(new SimpleParser().parse("  hi \n")).toBe("hi");
    expect(new SimpleParser({ trim: false }).parse("  hi ")).toBe("  hi ");
  });
});

describe("MarkdownParser", () => {
  it("returns the first fenced block", () => {
    const text = "Here:\n```sql\nSELECT 1;\n```\nand\n```\nignored\n```";

    expect(new MarkdownParser().parse(text)).toBe("SELECT 1;");
  });

  it("fails without a fenced block", () => {
    expect(() => new MarkdownParser().parse("SELECT 1;")).toThrow(UnparsableOutputError);
  });
});

describe("parsePartialJson", () => {
  it("closes open strings, arrays and objects", () => {
    expect(parsePartialJson('{"items": ["a", "b')).toEqual({ items: ["a", "b"] });
    expect(parsePartialJson('{"a": {"b": 1}')).toEqual({ a: { b: 1 } });
  });

  it("gives up on mismatched closers", () => {
    expect(parsePartialJson('{"a": [1}')).toBeUndefined();
    expect(parsePartialJson("")).toBeUndefined();
  });
});
