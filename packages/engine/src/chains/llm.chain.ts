import type { Logger } from "pino";
import { DEFAULT_OUTPUT_KEY, mergeCallOptions, type ModelCallDefaults } from "@promptweave/config";
import type { PromptFormatter } from "@promptweave/templates";
import {
  messagesToText,
  promptToMessages,
  type InvocationOptions,
  type ModelAdapter,
  type OutputVariables,
  type PromptValue,
  type Variables,
} from "@promptweave/types";
import { callModel } from "../model/model-caller";
import type { TextOutputParser } from "../output-parsers/text-output-parser";
import { BaseChain } from "./chain";

export interface LLMChainOptions {
  model: ModelAdapter;
  prompt: PromptFormatter;
  outputKey?: string;
  outputParser?: TextOutputParser;
  /** Defaults merged under every call's own options. */
  callOptions?: ModelCallDefaults;
  logger?: Logger;
}

/** Formats a prompt, calls the model once and stores the text. */
export class LLMChain extends BaseChain {
  readonly model: ModelAdapter;
  readonly prompt: PromptFormatter;
  readonly outputKey: string;
  readonly inputKeys: readonly string[];
  readonly outputKeys: readonly string[];
  private readonly outputParser?: TextOutputParser;
  private readonly callOptions: ModelCallDefaults;

  constructor(options: LLMChainOptions) {
    super({ logger: options.logger });
    this.model = options.model;
    this.prompt = options.prompt;
    this.outputKey = options.outputKey ?? DEFAULT_OUTPUT_KEY;
    this.outputParser = options.outputParser;
    this.callOptions = options.callOptions ?? {};
    this.inputKeys = this.prompt.inputVariables;
    this.outputKeys = [this.outputKey];
  }

  preparePrompt(variables: Variables): PromptValue {
    return this.prompt.formatPrompt(variables);
  }

  protected async call(
    variables: Variables,
    options: InvocationOptions
  ): Promise<OutputVariables> {
    const prompt = this.preparePrompt(variables);
    const messages = promptToMessages(prompt);
    this.logger.debug(
      { model: this.model.name, prompt: messagesToText(messages) },
      "Calling model"
    );

    const result = await callModel(
      this.model,
      messages,
      mergeCallOptions(this.callOptions, options),
      this.logger
    );
    if (result.usage) {
      this.logger.debug({ usage: result.usage }, "Model usage");
    }

    const text = this.outputParser ? this.outputParser.parse(result.text) : result.text;
    return { [this.outputKey]: text };
  }
}
