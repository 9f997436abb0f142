import { randomUUID } from "crypto";
import { UnparsableOutputError, type AgentDecision } from "@promptweave/types";
import type { AgentOutputParser, AgentOutputParserOptions } from "./agent-output-parser";

const FINAL_ANSWER = /^[ \t]*final\s*answer\s*[:-]\s*([\s\S]*)$/im;
const ACTION =
  /action\s*:\s*([^\n]*?)\s*\n[\s\S]*?action\s*input\s*:\s*([\s\S]*?)\s*(?:\n\s*observation\s*:[\s\S]*)?$/i;

const cleanToolName = (name: string): string =>
  name.trim().replace(/^[\[`'"]+|[\]`'".,;]+$/g, "").trim();

const unquote = (input: string): string => {
  const trimmed = input.trim();
  const match = /^(["'`])([\s\S]*)\1$/.exec(trimmed);
  return match?.[2] ?? trimmed;
};

/**
 * Reads `Action:` / `Action Input:` and `Final Answer:` markers. Replies
 * carrying both are rejected as ambiguous.
 */
export class ReActOutputParser implements AgentOutputParser {
  private readonly idFactory: () => string;

  constructor(options: AgentOutputParserOptions = {}) {
    this.idFactory = options.idFactory ?? randomUUID;
  }

  parse(text: string): AgentDecision {
    const action = ACTION.exec(text);
    const finalAnswer = FINAL_ANSWER.exec(text);

    if (action && finalAnswer) {
      throw new UnparsableOutputError(
        text,
        "Reply contains both a final answer and an action"
      );
    }

    if (finalAnswer) {
      return { type: "finish", output: (finalAnswer[1] ?? "").trim(), log: text };
    }

    const tool = action ? cleanToolName(action[1] ?? "") : "";
    if (!action || !tool) {
      throw new UnparsableOutputError(text, "Reply has neither an action nor a final answer");
    }

    return {
      type: "action",
      id: this.idFactory(),
      tool,
      toolInput: unquote(action[2] ?? ""),
      log: text,
    };
  }

  formatInstructions(toolNames: readonly string[]): string {
    return [
      "Use the following format:",
      "",
      "Thought: what to do next",
      `Action: the tool to use, one of [${toolNames.join(", ")}]`,
      "Action Input: the input for the tool",
      "Observation: the tool result",
      "... (Thought/Action/Action Input/Observation can repeat)",
      "Thought: I know the final answer",
      "Final Answer: the answer to the original input",
    ].join("\n");
  }
}
