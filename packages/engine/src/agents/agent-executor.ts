import type { Logger } from "pino";
import { parseCallOptions } from "@promptweave/config";
import { renderValue } from "@promptweave/templates";
import { normalizeToolName } from "@promptweave/tools";
import {
  MaxIterationsExceededError,
  MissingVariableError,
  ParseError,
  StreamingSinkError,
  TimeoutExceededError,
  ToolError,
  UnparsableOutputError,
  actionsOf,
  aiMessage,
  humanMessage,
  isMessageList,
  type AgentAction,
  type AgentDecision,
  type AgentRunResult,
  type AgentStep,
  type InvocationOptions,
  type InvocationOptionsInput,
  type Memory,
  type Message,
  type OutputVariables,
  type StreamSink,
  type VariableValue,
  type Variables,
} from "@promptweave/types";
import { BaseChain } from "../chains/chain";
import { raceAbort, throwIfAborted } from "../model/cancellation";
import type { Agent } from "./agent";
import { CHAT_HISTORY_VARIABLE } from "./conversational-agent";
import {
  INVALID_FORMAT_OBSERVATION,
  INVALID_FORMAT_TOOL,
  toolErrorObservation,
  toolNotFoundObservation,
  usageLimitObservation,
} from "./prompts";

export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_MAX_PARSE_RETRIES = 2;
export const INTERMEDIATE_STEPS_KEY = "intermediate_steps";

export interface AgentExecutorOptions {
  agent: Agent;
  /** Loaded before the run and updated with the final answer. */
  memory?: Memory;
  maxIterations?: number;
  timeoutMs?: number;
  /** Consecutive unparsable replies tolerated before the run fails. */
  maxParseRetries?: number;
  /** Consecutive tool failures tolerated; unset means never fatal. */
  maxToolErrors?: number;
  parallelToolCalls?: boolean;
  inputKey?: string;
  outputKey?: string;
  returnIntermediateSteps?: boolean;
  now?: () => number;
  logger?: Logger;
}

interface ToolOutcome {
  action: AgentAction;
  observation: string;
  error?: ToolError;
}

/** Per-invocation bookkeeping; never shared between runs. */
interface RunState {
  readonly startedAt: number;
  readonly steps: AgentStep[];
  readonly usage: Map<string, number>;
  iterations: number;
  parseFailures: number;
  toolErrors: number;
}

/**
 * Drives an agent through Thinking, Acting and Observing until it gives a
 * final answer or a bound trips. The time budget is checked only when a new
 * Thinking step starts, so a slow tool call is never interrupted by it.
 */
export class AgentExecutor extends BaseChain {
  readonly agent: Agent;
  readonly memory?: Memory;
  readonly inputKey: string;
  readonly outputKey: string;
  readonly inputKeys: readonly string[];
  readonly outputKeys: readonly string[];
  private readonly maxIterations: number;
  private readonly timeoutMs?: number;
  private readonly maxParseRetries: number;
  private readonly maxToolErrors?: number;
  private readonly parallelToolCalls: boolean;
  private readonly returnIntermediateSteps: boolean;
  private readonly now: () => number;

  constructor(options: AgentExecutorOptions) {
    super({ logger: options.logger });
    this.agent = options.agent;
    this.memory = options.memory;
    this.inputKey = options.inputKey ?? "input";
    this.outputKey = options.outputKey ?? "output";
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.timeoutMs = options.timeoutMs;
    this.maxParseRetries = options.maxParseRetries ?? DEFAULT_MAX_PARSE_RETRIES;
    this.maxToolErrors = options.maxToolErrors;
    this.parallelToolCalls = options.parallelToolCalls ?? true;
    this.returnIntermediateSteps = options.returnIntermediateSteps ?? false;
    this.now = options.now ?? Date.now;

    if (!Number.isInteger(this.maxIterations) || this.maxIterations <= 0) {
      throw new RangeError("maxIterations must be a positive integer");
    }
    if (!Number.isInteger(this.maxParseRetries) || this.maxParseRetries < 0) {
      throw new RangeError("maxParseRetries must be a non-negative integer");
    }

    this.inputKeys = Object.freeze(
      Array.from(new Set([this.inputKey, ...this.agent.inputKeys]))
    );
    this.outputKeys = Object.freeze([
      this.outputKey,
      ...(this.returnIntermediateSteps ? [INTERMEDIATE_STEPS_KEY] : []),
    ]);
  }

  /** Like `invoke`, but returns the steps and iteration count as well. */
  async execute(
    variables: Variables,
    options: InvocationOptionsInput = {}
  ): Promise<AgentRunResult> {
    const callOptions = parseCallOptions(options);
    try {
      return await this.runLoop(variables, callOptions);
    } catch (error) {
      throw this.wrapError(error);
    }
  }

  protected async call(
    variables: Variables,
    options: InvocationOptions
  ): Promise<OutputVariables> {
    const result = await this.runLoop(variables, options);
    return result.outputs;
  }

  private async runLoop(
    variables: Variables,
    options: InvocationOptions
  ): Promise<AgentRunResult> {
    const input = variables[this.inputKey];
    if (input === undefined) {
      throw new MissingVariableError(this.inputKey);
    }

    const { streamingSink, signal, maxIterations: _max, timeoutMs: _timeout, ...planOptions } =
      options;
    const maxIterations = options.maxIterations ?? this.maxIterations;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    throwIfAborted(signal);
    const history = await this.loadHistory(variables);
    const planVariables: Variables = { ...variables, [CHAT_HISTORY_VARIABLE]: history };
    const state: RunState = {
      startedAt: this.now(),
      steps: [],
      usage: new Map(),
      iterations: 0,
      parseFailures: 0,
      toolErrors: 0,
    };

    for (;;) {
      throwIfAborted(signal);

      const elapsed = this.now() - state.startedAt;
      if (timeoutMs !== undefined && elapsed >= timeoutMs) {
        this.logger.warn({ elapsed, timeoutMs }, "Agent time budget exhausted");
        throw new TimeoutExceededError(elapsed, timeoutMs, [...state.steps]);
      }
      if (state.iterations >= maxIterations) {
        this.logger.warn({ iterations: state.iterations }, "Agent iteration limit reached");
        throw new MaxIterationsExceededError(state.iterations, [...state.steps]);
      }

      state.iterations += 1;
      const decision = await this.think(state, planVariables, { ...planOptions, signal });
      if (!decision) {
        continue;
      }

      if (decision.type === "finish") {
        this.logger.debug({ iterations: state.iterations }, "Agent finished");
        return this.finish(state, input, decision.output, streamingSink, signal);
      }

      const actions = uniqueIds(actionsOf(decision));
      const outcomes = await this.act(actions, state, signal);
      this.observe(outcomes, state);
    }
  }

  /** Returns undefined when the reply was unparsable but may be retried. */
  private async think(
    state: RunState,
    variables: Variables,
    options: InvocationOptions
  ): Promise<AgentDecision | undefined> {
    try {
      const decision = await this.agent.plan(state.steps, variables, options);
      state.parseFailures = 0;
      return decision;
    } catch (error) {
      if (!(error instanceof UnparsableOutputError)) {
        throw error;
      }

      state.parseFailures += 1;
      if (state.parseFailures > this.maxParseRetries) {
        throw new ParseError(error.rawText, state.parseFailures, [...state.steps]);
      }

      this.logger.warn(
        { attempt: state.parseFailures, reason: error.message },
        "Unparsable agent reply; asking for a correction"
      );
      state.steps.push({
        action: {
          type: "action",
          id: `${INVALID_FORMAT_TOOL}:${state.iterations}`,
          tool: INVALID_FORMAT_TOOL,
          toolInput: "",
          log: error.rawText,
        },
        observation: INVALID_FORMAT_OBSERVATION,
        turn: state.iterations,
      });
      return undefined;
    }
  }

  private async act(
    actions: readonly AgentAction[],
    state: RunState,
    signal?: AbortSignal
  ): Promise<ToolOutcome[]> {
    let settled: ToolOutcome[];
    if (this.parallelToolCalls && actions.length > 1) {
      settled = await Promise.all(actions.map((action) => this.runTool(action, state, signal)));
    } else {
      settled = [];
      for (const action of actions) {
        throwIfAborted(signal);
        settled.push(await this.runTool(action, state, signal));
      }
    }

    const byId = new Map(settled.map((outcome) => [outcome.action.id, outcome]));
    return actions.flatMap((action) => {
      const outcome = byId.get(action.id);
      return outcome ? [outcome] : [];
    });
  }

  private async runTool(
    action: AgentAction,
    state: RunState,
    signal?: AbortSignal
  ): Promise<ToolOutcome> {
    const { tools } = this.agent;
    const tool = tools.get(action.tool);
    if (!tool) {
      this.logger.warn({ tool: action.tool }, "Agent requested an unknown tool");
      return { action, observation: toolNotFoundObservation(action.tool, tools.names()) };
    }

    const key = normalizeToolName(tool.name);
    const used = state.usage.get(key) ?? 0;
    if (tool.usageLimit !== undefined && used >= tool.usageLimit) {
      return { action, observation: usageLimitObservation(tool.name, tool.usageLimit) };
    }
    state.usage.set(key, used + 1);

    this.logger.debug({ tool: tool.name, id: action.id }, "Calling tool");
    try {
      const observation = await raceAbort(
        tools.execute({ id: action.id, tool: action.tool, input: action.toolInput }, { signal }),
        signal
      );
      return { action, observation };
    } catch (error) {
      if (!(error instanceof ToolError)) {
        throw error;
      }
      this.logger.warn({ tool: tool.name, err: error }, "Tool call failed");
      return { action, observation: toolErrorObservation(error.message), error };
    }
  }

  private observe(outcomes: readonly ToolOutcome[], state: RunState): void {
    for (const outcome of outcomes) {
      state.steps.push({
        action: outcome.action,
        observation: outcome.observation,
        turn: state.iterations,
      });

      if (!outcome.error) {
        state.toolErrors = 0;
        continue;
      }
      state.toolErrors += 1;
      if (this.maxToolErrors !== undefined && state.toolErrors >= this.maxToolErrors) {
        throw outcome.error;
      }
    }
  }

  private async finish(
    state: RunState,
    input: VariableValue,
    output: string,
    sink: StreamSink | undefined,
    signal: AbortSignal | undefined
  ): Promise<AgentRunResult> {
    throwIfAborted(signal);

    if (sink && output) {
      try {
        await sink.write(output);
      } catch (error) {
        throw new StreamingSinkError(error, 0);
      }
    }
    if (this.memory) {
      await this.memory.save(humanMessage(renderValue(input)), aiMessage(output));
    }

    const steps = [...state.steps];
    const outputs: OutputVariables = { [this.outputKey]: output };
    if (this.returnIntermediateSteps) {
      outputs[INTERMEDIATE_STEPS_KEY] = steps.map((step) => ({
        tool: step.action.tool,
        toolInput: step.action.toolInput,
        observation: step.observation,
      }));
    }
    return { output, steps, iterations: state.iterations, outputs };
  }

  private async loadHistory(variables: Variables): Promise<readonly Message[]> {
    if (this.memory) {
      return this.memory.load();
    }
    const supplied = variables[CHAT_HISTORY_VARIABLE];
    return isMessageList(supplied) ? supplied : [];
  }
}

/** Keeps batch ids distinct so results can be matched back reliably. */
function uniqueIds(actions: readonly AgentAction[]): AgentAction[] {
  const seen = new Set<string>();
  return actions.map((action, index) => {
    const id = seen.has(action.id) ? `${action.id}#${index}` : action.id;
    seen.add(id);
    return id === action.id ? action : { ...action, id };
  });
}
