import type { Message } from "./messages";

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** Sampling options forwarded untouched to the model adapter. */
export type ModelCallOptions = {
  maxTokens?: number;
  temperature?: number;
  topK?: number;
  topP?: number;
  seed?: number;
  stopWords?: string[];
  minLength?: number;
  maxLength?: number;
  repetitionPenalty?: number;
  signal?: AbortSignal;
};

export interface ModelResult {
  text: string;
  usage?: TokenUsage;
}

export type ModelStreamEvent =
  | { type: "delta"; text: string }
  | { type: "end"; usage?: TokenUsage };

export interface ModelAdapter {
  readonly name: string;
  generate(
    messages: readonly Message[],
    options: ModelCallOptions
  ): Promise<ModelResult>;
  /**
   * Optional incremental mode. Adapters without it are called through
   * `generate` and the whole text is delivered to the sink as one delta.
   */
  stream?(
    messages: readonly Message[],
    options: ModelCallOptions
  ): AsyncIterable<ModelStreamEvent>;
}

/** Caller-owned receiver of streamed text. */
export interface StreamSink {
  write(delta: string): void | Promise<void>;
}

export const sinkFromCallback = (
  callback: (delta: string) => void | Promise<void>
): StreamSink => ({ write: callback });
