import type { Logger } from "pino";
import type { ModelCallDefaults } from "@promptweave/config";
import { DummyMemory } from "@promptweave/memory";
import {
  MessageFormatter,
  placeholder,
  renderValue,
  templated,
  type PromptFormatter,
} from "@promptweave/templates";
import {
  MissingVariableError,
  aiMessage,
  humanMessage,
  type InvocationOptions,
  type Memory,
  type ModelAdapter,
  type OutputVariables,
  type Variables,
} from "@promptweave/types";
import { throwIfAborted } from "../model/cancellation";
import { BaseChain } from "./chain";
import { LLMChain } from "./llm.chain";

export const DEFAULT_CONVERSATION_PROMPT =
  "You are a helpful assistant holding a conversation with a human. " +
  "Answer using the conversation so far. If you do not know the answer, say so.";

export interface ConversationalChainOptions {
  model: ModelAdapter;
  /** Must accept the history variable as a placeholder. */
  prompt?: PromptFormatter;
  memory?: Memory;
  inputKey?: string;
  outputKey?: string;
  historyKey?: string;
  callOptions?: ModelCallDefaults;
  logger?: Logger;
}

function defaultPrompt(inputKey: string, historyKey: string): MessageFormatter {
  return MessageFormatter.fromNodes(
    templated("system", DEFAULT_CONVERSATION_PROMPT),
    placeholder(historyKey),
    templated("human", `{${inputKey}}`)
  );
}

/**
 * An LLM chain whose prompt is fed the stored conversation. The turn is
 * appended to memory only once the model call has succeeded.
 */
export class ConversationalChain extends BaseChain {
  readonly memory: Memory;
  readonly inputKey: string;
  readonly historyKey: string;
  readonly inputKeys: readonly string[];
  readonly outputKeys: readonly string[];
  private readonly llm: LLMChain;

  constructor(options: ConversationalChainOptions) {
    super({ logger: options.logger });
    this.memory = options.memory ?? new DummyMemory();
    this.inputKey = options.inputKey ?? "input";
    this.historyKey = options.historyKey ?? "history";
    this.llm = new LLMChain({
      model: options.model,
      prompt: options.prompt ?? defaultPrompt(this.inputKey, this.historyKey),
      outputKey: options.outputKey,
      callOptions: options.callOptions,
      logger: options.logger,
    });

    this.inputKeys = Object.freeze([
      this.inputKey,
      ...this.llm.inputKeys.filter(
        (key) => key !== this.inputKey && key !== this.historyKey
      ),
    ]);
    this.outputKeys = this.llm.outputKeys;
  }

  protected async call(
    variables: Variables,
    options: InvocationOptions
  ): Promise<OutputVariables> {
    const input = variables[this.inputKey];
    if (input === undefined) {
      throw new MissingVariableError(this.inputKey);
    }

    const history = await this.memory.load();
    const outputs = await this.llm.invoke(
      { ...variables, [this.historyKey]: history },
      options
    );

    throwIfAborted(options.signal);
    const primary = outputs[this.llm.outputKey];
    await this.memory.save(
      humanMessage(renderValue(input)),
      aiMessage(primary === undefined ? "" : renderValue(primary))
    );
    return outputs;
  }
}
