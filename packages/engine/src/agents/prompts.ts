export const DEFAULT_AGENT_PREFIX = [
  "You are an assistant that answers the user's request, calling tools when",
  "they help. Tool results are shown to you as observations. When you know",
  "the answer, reply with a final answer instead of another tool call.",
].join("\n");

/** Jinja template; `tools` and `format_instructions` are bound up front. */
export const DEFAULT_AGENT_SUFFIX = `TOOLS
-----
You can use the following tools:

{{ tools }}

RESPONSE FORMAT
---------------
{{ format_instructions }}

USER'S INPUT
------------
{{ input }}`;

export const INVALID_FORMAT_OBSERVATION =
  "Could not parse your last response. Follow the response format exactly and try again.";

/** Tool name recorded on the synthetic step that carries a parse correction. */
export const INVALID_FORMAT_TOOL = "_invalid_format";

export const toolNotFoundObservation = (tool: string, available: readonly string[]): string =>
  `"${tool}" is not a valid tool. Use one of [${available.join(", ")}] or give your final answer.`;

export const toolErrorObservation = (message: string): string =>
  `The tool returned the following error: ${message}`;

export const usageLimitObservation = (tool: string, limit: number): string =>
  `You have used the tool ${tool} too many times (limit ${limit}). Use another tool or give your final answer.`;

export const observationMessage = (tool: string, observation: string): string =>
  `Observation from ${tool}:\n${observation}\n\nContinue with another tool call or your final answer, using the response format.`;
