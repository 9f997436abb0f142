import { describe, expect, it } from "vitest";
import { UnparsableOutputError } from "@promptweave/types";
import { JsonAgentOutputParser } from "../../src/output-parsers/json-agent.parser";

function createParser() {
  let next = 0;
  return new JsonAgentOutputParser({ idFactory: () => `id-${++next}` });
}

describe("JsonAgentOutputParser", () => {
  it("reads an action from a fenced json block", () => {
    const text = [
      "I should look this up.",
      "```json",
      '{"action": "search", "action_input": "weather in Lima"}',
      "```",
    ].join("\n");

    expect(createParser().parse(text)).toEqual({
      type: "action",
      id: "id-1",
      tool: "search",
      toolInput: "weather in Lima",
      log: text,
    });
  });

  it("serialises structured tool input as JSON", () => {
    const decision = createParser().parse(
      '{"action": "calculator", "action_input": {"expression": "2 + 2"}}'
    );

    expect(decision).toMatchObject({
      type: "action",
      tool: "calculator",
      toolInput: '{"expression":"2 + 2"}',
    });
  });

  it("keeps ids the model supplied", () => {
    expect(
      createParser().parse('{"id": "call-9", "action": "search", "action_input": "x"}')
    ).toMatchObject({ id: "call-9" });
  });

  it("finishes on a Final Answer action", () => {
    const text = '```json\n{"action": "Final Answer", "action_input": "It is sunny."}\n```';

    expect(createParser().parse(text)).toEqual({
      type: "finish",
      output: "It is sunny.",
      log: text,
    });
  });

  it("finishes on a final_answer field", () => {
    expect(createParser().parse('{"final_answer": "done"}')).toMatchObject({
      type: "finish",
      output: "done",
    });
  });

  it("tolerates key spelling and surrounding prose", () => {
    const decision = createParser().parse(
      'Sure! {"Action": "search", "Action Input": "tides"} Hope that helps.'
    );

    expect(decision).toMatchObject({ type: "action", tool: "search", toolInput: "tides" });
  });

  it("stops at the balanced closer when later prose has braces", () => {
    const decision = createParser().parse(
      '{"action": "search", "action_input": "lima {peru}"}\nI will then format it as {city}.'
    );

    expect(decision).toMatchObject({ type: "action", tool: "search", toolInput: "lima {peru}" });
  });

  it("repairs truncated JSON and trailing commas", () => {
    expect(
      createParser().parse('{"action": "search", "action_input": "weath')
    ).toMatchObject({ tool: "search", toolInput: "weath" });
    expect(
      createParser().parse('{"action": "search", "action_input": "x",}')
    ).toMatchObject({ tool: "search", toolInput: "x" });
  });

  it("turns a JSON array of actions into a batch", () => {
    const decision = createParser().parse(
      '[{"action": "search", "action_input": "a"}, {"action": "lookup", "action_input": "b"}]'
    );

    expect(decision.type).toBe("batch");
    expect(decision.type === "batch" && decision.actions).toEqual([
      expect.objectContaining({ id: "id-1", tool: "search", toolInput: "a" }),
      expect.objectContaining({ id: "id-2", tool: "lookup", toolInput: "b" }),
    ]);
  });

  it("rejects replies without a usable object", () => {
    const parser = createParser();

    expect(() => parser.parse("I think the answer is 4.")).toThrow(UnparsableOutputError);
    expect(() => parser.parse('{"thought": "hmm"}')).toThrow('Missing "action" field');
    expect(() =>
      parser.parse('[{"action": "search", "action_input": "a"}, {"final_answer": "b"}]')
    ).toThrow(UnparsableOutputError);
  });

  it("lists the tools in its format instructions", () => {
    expect(createParser().formatInstructions(["search", "lookup"])).toContain(
      '{"action": "<one of: search, lookup>", "action_input": "<input for the tool>"}'
    );
  });
});
