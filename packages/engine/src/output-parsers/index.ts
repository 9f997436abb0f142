export {
  MarkdownParser,
  SimpleParser,
  extractFencedBlock,
  type SimpleParserOptions,
  type TextOutputParser,
} from "./text-output-parser";
export type { AgentOutputParser, AgentOutputParserOptions } from "./agent-output-parser";
export { JsonAgentOutputParser } from "./json-agent.parser";
export { ReActOutputParser } from "./react.parser";
export { parsePartialJson } from "./partial-json";
