import type { VariableValue } from "./variables";

export interface AgentAction {
  readonly type: "action";
  /** Correlates a tool result with the request, including in batches. */
  readonly id: string;
  readonly tool: string;
  readonly toolInput: string;
  readonly log: string;
}

export interface AgentFinish {
  readonly type: "finish";
  readonly output: string;
  readonly log: string;
}

/** Several actions requested in one model turn. */
export interface AgentActionBatch {
  readonly type: "batch";
  readonly actions: readonly AgentAction[];
  readonly log: string;
}

export type AgentDecision = AgentAction | AgentFinish | AgentActionBatch;

export interface AgentStep {
  readonly action: AgentAction;
  readonly observation: string;
  /** Thinking iteration that produced the action; shared within a batch. */
  readonly turn: number;
}

export type Scratchpad = readonly AgentStep[];

export type AgentState =
  | "start"
  | "thinking"
  | "acting"
  | "observing"
  | "done"
  | "failed";

export interface AgentRunResult {
  readonly output: string;
  readonly steps: Scratchpad;
  readonly iterations: number;
  readonly outputs: Record<string, VariableValue>;
}

export function isAgentFinish(decision: AgentDecision): decision is AgentFinish {
  return decision.type === "finish";
}

export function actionsOf(decision: AgentDecision): readonly AgentAction[] {
  switch (decision.type) {
    case "action":
      return [decision];
    case "batch":
      return decision.actions;
    default:
      return [];
  }
}
