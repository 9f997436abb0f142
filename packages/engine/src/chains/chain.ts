import type { Logger } from "pino";
import { parseCallOptions } from "@promptweave/config";
import { createSilentLogger } from "@promptweave/io";
import {
  ChainError,
  isPromptweaveError,
  sinkFromCallback,
  type InvocationOptions,
  type InvocationOptionsInput,
  type OutputVariables,
  type StreamSink,
  type Variables,
} from "@promptweave/types";
import { renderValue } from "@promptweave/templates";
import { throwIfAborted } from "../model/cancellation";

/** Anything that maps named inputs to named outputs. */
export interface Chain {
  readonly inputKeys: readonly string[];
  /** The first entry is the primary output. */
  readonly outputKeys: readonly string[];
  invoke(
    variables: Variables,
    options?: InvocationOptionsInput
  ): Promise<OutputVariables>;
}

export interface BaseChainOptions {
  logger?: Logger;
}

/** Errors in these kinds are caller mistakes and get wrapped as permanent. */
const FORMATTING_KINDS = new Set(["missing_variable", "malformed_template", "invalid_variable"]);

export abstract class BaseChain implements Chain {
  abstract readonly inputKeys: readonly string[];
  abstract readonly outputKeys: readonly string[];
  protected readonly logger: Logger;

  protected constructor(options: BaseChainOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  protected abstract call(
    variables: Variables,
    options: InvocationOptions
  ): Promise<OutputVariables>;

  async invoke(
    variables: Variables,
    options: InvocationOptionsInput = {}
  ): Promise<OutputVariables> {
    const callOptions = parseCallOptions(options);
    throwIfAborted(callOptions.signal);

    const chain = this.constructor.name;
    this.logger.debug({ chain, inputs: Object.keys(variables) }, "Chain invoked");

    try {
      const outputs = await this.call(variables, callOptions);
      this.logger.debug({ chain, outputs: Object.keys(outputs) }, "Chain completed");
      return outputs;
    } catch (error) {
      const wrapped = this.wrapError(error);
      this.logger.warn(
        { chain, err: error, kind: isPromptweaveError(wrapped) ? wrapped.kind : undefined },
        "Chain failed"
      );
      throw wrapped;
    }
  }

  /** Runs the chain and returns its primary output rendered as text. */
  async run(variables: Variables, options?: InvocationOptionsInput): Promise<string> {
    const outputs = await this.invoke(variables, options);
    const primary = outputs[this.outputKeys[0] ?? ""];
    return primary === undefined ? "" : renderValue(primary);
  }

  stream(
    variables: Variables,
    sink: StreamSink | ((delta: string) => void | Promise<void>),
    options: InvocationOptionsInput = {}
  ): Promise<OutputVariables> {
    const streamingSink = typeof sink === "function" ? sinkFromCallback(sink) : sink;
    return this.invoke(variables, { ...options, streamingSink });
  }

  protected wrapError(error: unknown): unknown {
    if (isPromptweaveError(error) && !FORMATTING_KINDS.has(error.kind)) {
      return error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new ChainError(`${this.constructor.name} failed: ${reason}`, error);
  }
}

/** Picks the named outputs from an accumulated variable map. */
export function pickOutputs(
  variables: Variables,
  keys: readonly string[]
): OutputVariables {
  const outputs: OutputVariables = {};
  for (const key of keys) {
    const value = variables[key];
    if (value !== undefined) {
      outputs[key] = value;
    }
  }
  return outputs;
}
