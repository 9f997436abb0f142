import { describe, expect, it, vi } from "vitest";
import {
  CancelledError,
  StreamingSinkError,
  humanMessage,
  sinkFromCallback,
} from "@promptweave/types";
import { callModel, toModelCallOptions } from "../../src/model/model-caller";
import { ScriptedModel, StreamingScriptedModel } from "../support/scripted-model";

const messages = [humanMessage("Say hello")];

describe("callModel", () => {
  it("calls generate when no sink is supplied", async () => {
    const model = new ScriptedModel(["Hello"]);

    const result = await callModel(model, messages, { temperature: 0.2 });

    expect(result).toEqual({ text: "Hello" });
    expect(model.calls).toHaveLength(1);
    expect(model.calls[0]?.options).toEqual({ temperature: 0.2 });
  });

  it("forwards deltas in order and returns their concatenation", async () => {
    const usage = { promptTokens: 3, completionTokens: 2, totalTokens: 5 };
    const model = new StreamingScriptedModel(["unused"], { deltas: ["Hel", "lo"], usage });
    const received: string[] = [];

    const result = await callModel(model, messages, {
      streamingSink: sinkFromCallback((delta) => {
        received.push(delta);
      }),
    });

    expect(received).toEqual(["Hel", "lo"]);
    expect(result).toEqual({ text: "Hello", usage });
  });

  it("delivers the whole reply as one delta when the adapter cannot stream", async () => {
    const model = new ScriptedModel(["Hello there"]);
    const write = vi.fn();

    const result = await callModel(model, messages, { streamingSink: { write } });

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith("Hello there");
    expect(result.text).toBe("Hello there");
  });

  it("fails with StreamingSinkError when the sink rejects a delta", async () => {
    const model = new StreamingScriptedModel(["unused"], { deltas: ["Hel", "lo"] });
    let calls = 0;
    const sink = sinkFromCallback(() => {
      calls += 1;
      if (calls === 2) {
        throw new Error("sink closed");
      }
    });

    const error = await callModel(model, messages, { streamingSink: sink }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(StreamingSinkError);
    expect(error).toMatchObject({
      deltasDelivered: 1,
      message: "Streaming sink failed after 1 delta(s): sink closed",
    });
  });

  it("refuses to call the model once the signal has aborted", async () => {
    const model = new ScriptedModel(["Hello"]);
    const controller = new AbortController();
    controller.abort("user left");

    await expect(
      callModel(model, messages, { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(model.calls).toHaveLength(0);
  });
});

describe("toModelCallOptions", () => {
  it("drops orchestration options", () => {
    const signal = new AbortController().signal;

    expect(
      toModelCallOptions({
        temperature: 0,
        maxIterations: 4,
        timeoutMs: 100,
        streamingSink: { write: () => undefined },
        signal,
      })
    ).toEqual({ temperature: 0, signal });
  });
});
