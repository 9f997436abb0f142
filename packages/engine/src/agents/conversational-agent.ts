import type { Logger } from "pino";
import { mergeCallOptions, type ModelCallDefaults } from "@promptweave/config";
import { createSilentLogger } from "@promptweave/io";
import {
  MessageFormatter,
  MessageTemplate,
  PromptTemplate,
  literal,
  placeholder,
  templated,
} from "@promptweave/templates";
import { ToolRegistry } from "@promptweave/tools";
import {
  aiMessage,
  humanMessage,
  isMessageList,
  systemMessage,
  type AgentDecision,
  type InvocationOptions,
  type Message,
  type ModelAdapter,
  type Scratchpad,
  type Tool,
  type Variables,
} from "@promptweave/types";
import { callModel } from "../model/model-caller";
import type { AgentOutputParser } from "../output-parsers/agent-output-parser";
import { JsonAgentOutputParser } from "../output-parsers/json-agent.parser";
import type { Agent } from "./agent";
import {
  DEFAULT_AGENT_PREFIX,
  DEFAULT_AGENT_SUFFIX,
  INVALID_FORMAT_TOOL,
  observationMessage,
} from "./prompts";

export const CHAT_HISTORY_VARIABLE = "chat_history";
export const SCRATCHPAD_VARIABLE = "agent_scratchpad";

export interface ConversationalAgentOptions {
  model: ModelAdapter;
  tools: ToolRegistry | readonly Tool[];
  prefix?: string;
  /** Jinja template rendered as the human turn; sees `tools`, `tool_names`, `format_instructions` and `input`. */
  suffix?: string;
  outputParser?: AgentOutputParser;
  callOptions?: ModelCallDefaults;
  logger?: Logger;
}

/**
 * Replays each turn as the model's raw reply followed by one human message
 * per tool observation, in request order.
 */
export function renderScratchpad(steps: Scratchpad): Message[] {
  const messages: Message[] = [];
  let turn: number | undefined;

  for (const step of steps) {
    if (step.turn !== turn) {
      turn = step.turn;
      messages.push(aiMessage(step.action.log));
    }
    messages.push(
      humanMessage(
        step.action.tool === INVALID_FORMAT_TOOL
          ? step.observation
          : observationMessage(step.action.tool, step.observation)
      )
    );
  }
  return messages;
}

/** A chat agent that plans by asking the model for JSON (or ReAct) replies. */
export class ConversationalAgent implements Agent {
  readonly tools: ToolRegistry;
  readonly prompt: MessageFormatter;
  readonly inputKeys: readonly string[];
  private readonly model: ModelAdapter;
  private readonly outputParser: AgentOutputParser;
  private readonly callOptions: ModelCallDefaults;
  private readonly logger: Logger;

  constructor(options: ConversationalAgentOptions) {
    this.model = options.model;
    this.tools =
      options.tools instanceof ToolRegistry ? options.tools : new ToolRegistry(options.tools);
    this.outputParser = options.outputParser ?? new JsonAgentOutputParser();
    this.callOptions = options.callOptions ?? {};
    this.logger = options.logger ?? createSilentLogger();

    const toolNames = this.tools.names();
    const suffix = PromptTemplate.fromTemplate(options.suffix ?? DEFAULT_AGENT_SUFFIX, {
      format: "jinja2",
    }).partial({
      tools: this.tools.describe(),
      tool_names: toolNames.join(", "),
      format_instructions: this.outputParser.formatInstructions(toolNames),
    });

    this.prompt = MessageFormatter.fromNodes(
      literal(systemMessage(options.prefix ?? DEFAULT_AGENT_PREFIX)),
      placeholder(CHAT_HISTORY_VARIABLE),
      templated(new MessageTemplate("human", suffix)),
      placeholder(SCRATCHPAD_VARIABLE)
    );
    this.inputKeys = Object.freeze(
      this.prompt.inputVariables.filter(
        (name) => name !== CHAT_HISTORY_VARIABLE && name !== SCRATCHPAD_VARIABLE
      )
    );
  }

  async plan(
    steps: Scratchpad,
    variables: Variables,
    options: InvocationOptions = {}
  ): Promise<AgentDecision> {
    const history = variables[CHAT_HISTORY_VARIABLE];
    const messages = this.prompt.formatMessages({
      ...variables,
      [CHAT_HISTORY_VARIABLE]: isMessageList(history) ? history : [],
      [SCRATCHPAD_VARIABLE]: renderScratchpad(steps),
    });
    this.logger.debug(
      { model: this.model.name, messages: messages.length, steps: steps.length },
      "Planning next step"
    );

    const { streamingSink: _streamingSink, ...callOptions } = options;
    const result = await callModel(
      this.model,
      messages,
      mergeCallOptions(this.callOptions, callOptions),
      this.logger
    );
    return this.outputParser.parse(result.text);
  }
}
