import { describe, expect, it } from "vitest";
import { UnparsableOutputError } from "@promptweave/types";
import { ReActOutputParser } from "../../src/output-parsers/react.parser";

const parser = new ReActOutputParser({ idFactory: () => "step-1" });

describe("ReActOutputParser", () => {
  it("reads an action and its input", () => {
    const text = "Thought: I need the forecast\nAction: search\nAction Input: weather in Paris";

    expect(parser.parse(text)).toEqual({
      type: "action",
      id: "step-1",
      tool: "search",
      toolInput: "weather in Paris",
      log: text,
    });
  });

  it("reads a final answer", () => {
    expect(parser.parse("Thought: I know it now\nFinal Answer: 42")).toMatchObject({
      type: "finish",
      output: "42",
    });
  });

  it("tolerates spacing, quoting and punctuation around markers", () => {
    expect(parser.parse('action :  `Search`.\naction input: "Paris"')).toMatchObject({
      tool: "Search",
      toolInput: "Paris",
    });
  });

  it("ignores a hallucinated observation after the input", () => {
    expect(
      parser.parse("Action: search\nAction Input: tides\nObservation: high at noon")
    ).toMatchObject({ tool: "search", toolInput: "tides" });
  });

  it("only treats a line-leading marker as a final answer", () => {
    const text = "Thought: I need the final answer - let me search\nAction: search\nAction Input: tides";

    expect(parser.parse(text)).toMatchObject({ type: "action", tool: "search", toolInput: "tides" });
    expect(parser.parse("Thought: done\n  final answer - low tide")).toMatchObject({
      type: "finish",
      output: "low tide",
    });
  });

  it("rejects ambiguous or empty replies", () => {
    expect(() =>
      parser.parse("Action: search\nAction Input: x\nFinal Answer: y")
    ).toThrow(UnparsableOutputError);
    expect(() => parser.parse("I am not sure.")).toThrow(UnparsableOutputError);
  });
});
