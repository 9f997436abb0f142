import { describe, expect, it } from "vitest";
import { normalizeToolName, parseToolInput } from "../src/tool-input";

describe("normalizeToolName", () => {
  it.each([
    ["Web Search", "web_search"],
    ['"calculator"', "calculator"],
    ["`Wiki Lookup`", "wiki_lookup"],
    ["  lookup  ", "lookup"],
  ])("normalises %s to %s", (raw, expected) => {
    expect(normalizeToolName(raw)).toBe(expected);
  });
});

describe("parseToolInput", () => {
  it("passes plain text through", () => {
    expect(parseToolInput("weather in Oslo")).toEqual({
      input: "weather in Oslo",
      arguments: { input: "weather in Oslo" },
    });
  });

  it("unwraps a string input field from a JSON object", () => {
    expect(parseToolInput('{"input": "Oslo", "units": "metric"}')).toEqual({
      input: "Oslo",
      arguments: { input: "Oslo", units: "metric" },
    });
  });

  it("keeps the raw JSON as text when there is no input field", () => {
    const raw = '{"query": "tides"}';

    expect(parseToolInput(raw)).toEqual({ input: raw, arguments: { query: "tides" } });
  });

  it("unquotes JSON strings", () => {
    expect(parseToolInput('"hello"')).toEqual({
      input: "hello",
      arguments: { input: "hello" },
    });
  });

  it("treats JSON scalars and arrays as text", () => {
    expect(parseToolInput("42")).toEqual({ input: "42", arguments: { input: "42" } });
  });
});
