import type { Logger } from "pino";
import {
  StreamingSinkError,
  type InvocationOptions,
  type Message,
  type ModelAdapter,
  type ModelCallOptions,
  type ModelResult,
  type StreamSink,
  type TokenUsage,
} from "@promptweave/types";
import { raceAbort, throwIfAborted } from "./cancellation";

/** Strips the orchestration-only options before they reach the adapter. */
export function toModelCallOptions(options: InvocationOptions): ModelCallOptions {
  const {
    streamingSink: _streamingSink,
    maxIterations: _maxIterations,
    timeoutMs: _timeoutMs,
    ...callOptions
  } = options;
  return callOptions;
}

async function deliver(sink: StreamSink, delta: string, delivered: number): Promise<void> {
  try {
    await sink.write(delta);
  } catch (error) {
    throw new StreamingSinkError(error, delivered);
  }
}

/**
 * Issues one model call. With a sink, deltas are forwarded in arrival order
 * and the returned text is exactly their concatenation. A failing sink
 * abandons the stream; nothing is retried.
 */
export async function callModel(
  model: ModelAdapter,
  messages: readonly Message[],
  options: InvocationOptions,
  logger?: Logger,
): Promise<ModelResult> {
  const { streamingSink, signal } = options;
  const callOptions = toModelCallOptions(options);
  throwIfAborted(signal);

  if (!streamingSink) {
    return raceAbort(model.generate(messages, callOptions), signal);
  }

  if (!model.stream) {
    const result = await raceAbort(model.generate(messages, callOptions), signal);
    if (result.text) {
      await deliver(streamingSink, result.text, 0);
    }
    return result;
  }

  const iterator = model.stream(messages, callOptions)[Symbol.asyncIterator]();
  let text = "";
  let delivered = 0;
  let usage: TokenUsage | undefined;
  let exhausted = false;
  let completed = false;

  try {
    for (;;) {
      const next = await raceAbort(iterator.next(), signal);
      if (next.done) {
        exhausted = true;
        break;
      }

      const event = next.value;
      if (event.type === "end") {
        usage = event.usage;
        break;
      }
      if (!event.text) {
        continue;
      }

      await deliver(streamingSink, event.text, delivered);
      delivered += 1;
      text += event.text;
    }
    completed = true;
  } finally {
    if (!exhausted && !completed && iterator.return) {
      void iterator.return().catch((error: unknown) => {
        logger?.debug({ err: error }, "Failed to close abandoned model stream");
      });
    }
  }

  if (!exhausted && iterator.return) {
    await iterator.return();
  }

  return usage ? { text, usage } : { text };
}
