import type { ToolRegistry } from "@promptweave/tools";
import type {
  AgentDecision,
  InvocationOptions,
  Scratchpad,
  Variables,
} from "@promptweave/types";

/** Decides the next step from the inputs and the steps taken so far. */
export interface Agent {
  readonly inputKeys: readonly string[];
  readonly tools: ToolRegistry;
  plan(
    steps: Scratchpad,
    variables: Variables,
    options?: InvocationOptions
  ): Promise<AgentDecision>;
}
