import pino from "pino";
import { describe, expect, it } from "vitest";
import { ConfigValidationError } from "@promptweave/config";
import {
  MessageFormatter,
  PromptTemplate,
  literal,
  templated,
} from "@promptweave/templates";
import {
  ChainError,
  MissingVariableError,
  systemMessage,
} from "@promptweave/types";
import { LLMChain } from "../../src/chains/llm.chain";
import { SimpleParser } from "../../src/output-parsers/text-output-parser";
import { ScriptedModel, StreamingScriptedModel } from "../support/scripted-model";

describe("LLMChain", () => {
  it("sends a string prompt as a single human message", async () => {
    const model = new ScriptedModel(["Cats purr."]);
    const chain = new LLMChain({
      model,
      prompt: PromptTemplate.fromTemplate("Tell me about {topic}"),
    });

    const outputs = await chain.invoke({ topic: "cats" });

    expect(outputs).toEqual({ text: "Cats purr." });
    expect(chain.inputKeys).toEqual(["topic"]);
    expect(model.calls[0]?.messages.map((m) => [m.role, m.content])).toEqual([
      ["human", "Tell me about cats"],
    ]);
  });

  it("logs the formatted prompt before calling the model", async () => {
    const lines: string[] = [];
    const logger = pino({ level: "debug" }, { write: (line: string) => lines.push(line) });
    const chain = new LLMChain({
      model: new ScriptedModel(["Cats purr."]),
      prompt: PromptTemplate.fromTemplate("Tell me about {topic}"),
      logger,
    });

    await chain.invoke({ topic: "cats" });

    const entries: unknown[] = lines.map((line) => JSON.parse(line));
    expect(entries).toContainEqual(
      expect.objectContaining({
        msg: "Calling model",
        model: "scripted",
        prompt: "human: Tell me about cats",
      })
    );
  });

  it("sends chat prompts unchanged and stores under the configured key", async () => {
    const model = new ScriptedModel(["  Bonjour  "]);
    const chain = new LLMChain({
      model,
      prompt: MessageFormatter.fromNodes(
        literal(systemMessage("Translate to French.")),
        templated("human", "{text}")
      ),
      outputKey: "translation",
      outputParser: new SimpleParser(),
    });

    const outputs = await chain.invoke({ text: "Hello" });

    expect(outputs).toEqual({ translation: "Bonjour" });
    expect(chain.outputKeys).toEqual(["translation"]);
    expect(model.calls[0]?.messages).toHaveLength(2);
  });

  it("lets per-call options override defaults and drops unknown keys", async () => {
    const model = new ScriptedModel(["ok"]);
    const chain = new LLMChain({
      model,
      prompt: PromptTemplate.fromTemplate("{q}"),
      callOptions: { maxTokens: 20, temperature: 0.1 },
    });

    await chain.invoke({ q: "?" }, { temperature: 0.5, vendorFlag: true });

    expect(model.calls[0]?.options).toEqual({ maxTokens: 20, temperature: 0.5 });
  });

  it("rejects invalid recognised options before calling the model", async () => {
    const model = new ScriptedModel(["ok"]);
    const chain = new LLMChain({ model, prompt: PromptTemplate.fromTemplate("{q}") });

    await expect(chain.invoke({ q: "?" }, { temperature: -1 })).rejects.toBeInstanceOf(
      ConfigValidationError
    );
    expect(model.calls).toHaveLength(0);
  });

  it("wraps formatting failures as permanent chain errors", async () => {
    const model = new ScriptedModel(["never"]);
    const chain = new LLMChain({ model, prompt: PromptTemplate.fromTemplate("{topic}") });

    const error = await chain.invoke({}).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ChainError);
    expect(error).toMatchObject({ retryable: false });
    expect(error instanceof ChainError && error.cause).toBeInstanceOf(MissingVariableError);
    expect(model.calls).toHaveLength(0);
  });

  it("marks model failures as retryable", async () => {
    const model = new ScriptedModel([new Error("503 from upstream")]);
    const chain = new LLMChain({ model, prompt: PromptTemplate.fromTemplate("{q}") });

    await expect(chain.invoke({ q: "?" })).rejects.toMatchObject({
      kind: "chain",
      retryable: true,
      message: "LLMChain failed: 503 from upstream",
    });
  });

  it("run returns the primary output text", async () => {
    const chain = new LLMChain({
      model: new ScriptedModel(["42"]),
      prompt: PromptTemplate.fromTemplate("{q}"),
    });

    await expect(chain.run({ q: "answer?" })).resolves.toBe("42");
  });

  it("stream delivers deltas whose concatenation equals the output", async () => {
    const chain = new LLMChain({
      model: new StreamingScriptedModel(["unused"], { deltas: ["Hel", "lo"] }),
      prompt: PromptTemplate.fromTemplate("{q}"),
    });
    const deltas: string[] = [];

    const outputs = await chain.stream({ q: "greet" }, (delta) => {
      deltas.push(delta);
    });

    expect(deltas).toEqual(["Hel", "lo"]);
    expect(outputs).toEqual({ text: deltas.join("") });
  });
});
