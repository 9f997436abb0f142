import type { AgentDecision } from "@promptweave/types";

/** Turns a model reply into the agent's next decision. */
export interface AgentOutputParser {
  /** Throws `UnparsableOutputError` when the text fits no known shape. */
  parse(text: string): AgentDecision;
  formatInstructions(toolNames: readonly string[]): string;
}

export interface AgentOutputParserOptions {
  /** Supplies ids for actions the model did not number itself. */
  idFactory?: () => string;
}
