import { randomUUID } from "crypto";
import {
  UnparsableOutputError,
  type AgentAction,
  type AgentDecision,
} from "@promptweave/types";
import type { AgentOutputParser, AgentOutputParserOptions } from "./agent-output-parser";
import { parsePartialJson } from "./partial-json";
import { extractFencedBlock } from "./text-output-parser";

const FINAL_ANSWER = "finalanswer";

const normalizeKey = (key: string): string =>
  key.toLowerCase().replace(/[^a-z0-9]/g, "");

const stringify = (value: unknown): string =>
  typeof value === "string" ? value : JSON.stringify(value) ?? "";

/**
 * Slices from the first opening bracket to its balanced closer, skipping
 * string contents. An unclosed span runs to the end of the text.
 */
function extractJsonSpan(text: string): string | undefined {
  const start = text.search(/[[{]/);
  if (start < 0) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let index = start; index < text.length; index++) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === "{" || char === "[") {
      depth += 1;
    } else if (char === "}" || char === "]") {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, index + 1);
      }
    }
  }
  return text.slice(start);
}

function fieldsOf(value: unknown): Map<string, unknown> | undefined {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  const fields = new Map<string, unknown>();
  for (const [key, entry] of Object.entries(value)) {
    fields.set(normalizeKey(key), entry);
  }
  return fields;
}

/**
 * Reads `{"action": ..., "action_input": ...}` replies, fenced or bare.
 * `{"final_answer": ...}` or an action named "Final Answer" finishes the
 * run; a JSON array of actions requests them all in one turn.
 */
export class JsonAgentOutputParser implements AgentOutputParser {
  private readonly idFactory: () => string;

  constructor(options: AgentOutputParserOptions = {}) {
    this.idFactory = options.idFactory ?? randomUUID;
  }

  parse(text: string): AgentDecision {
    const candidate = extractFencedBlock(text) ?? extractJsonSpan(text);
    if (candidate === undefined) {
      throw new UnparsableOutputError(text, "No JSON object found in model output");
    }

    const value = parsePartialJson(candidate);
    if (value === undefined) {
      throw new UnparsableOutputError(text, "Model output is not valid JSON");
    }

    if (!Array.isArray(value)) {
      return this.toDecision(value, text);
    }
    if (value.length === 1) {
      return this.toDecision(value[0], text);
    }
    if (value.length === 0) {
      throw new UnparsableOutputError(text, "Model requested an empty list of actions");
    }

    const actions = value.map((item: unknown) => {
      const decision = this.toDecision(item, text);
      if (decision.type !== "action") {
        throw new UnparsableOutputError(text, "A final answer cannot be batched with actions");
      }
      return decision;
    });
    return { type: "batch", actions, log: text };
  }

  formatInstructions(toolNames: readonly string[]): string {
    return [
      "Reply with a markdown code block containing a single JSON object.",
      "",
      "To use a tool:",
      "```json",
      `{"action": "<one of: ${toolNames.join(", ")}>", "action_input": "<input for the tool>"}`,
      "```",
      "",
      "To use several tools at once, reply with a JSON array of such objects.",
      "",
      "To give your final answer:",
      "```json",
      '{"action": "Final Answer", "action_input": "<your answer>"}',
      "```",
    ].join("\n");
  }

  private toDecision(value: unknown, log: string): AgentDecision {
    const fields = fieldsOf(value);
    if (!fields) {
      throw new UnparsableOutputError(log, "Expected a JSON object");
    }

    if (fields.has(FINAL_ANSWER)) {
      return { type: "finish", output: stringify(fields.get(FINAL_ANSWER)), log };
    }

    const action = fields.get("action");
    if (typeof action !== "string" || !action.trim()) {
      throw new UnparsableOutputError(log, 'Missing "action" field');
    }

    const input = fields.get("actioninput") ?? fields.get("input") ?? "";
    if (normalizeKey(action) === FINAL_ANSWER) {
      return { type: "finish", output: stringify(input), log };
    }

    const id = fields.get("id");
    const result: AgentAction = {
      type: "action",
      id: typeof id === "string" && id ? id : this.idFactory(),
      tool: action.trim(),
      toolInput: stringify(input),
      log,
    };
    return result;
  }
}
