export {
  ToolRegistry,
  ToolRegistryFactory,
  type ToolCallOptions,
  type ToolCallRequest,
} from "./tool-registry.service";
export { normalizeToolName, parseToolInput, type ParsedToolInput } from "./tool-input";
export {
  createCommandExecutorTool,
  type CommandExecutorOptions,
  type CommandInput,
  type DisallowedCommand,
} from "./builtin/command-executor";
export { createBuiltinTools, type BuiltinToolOptions } from "./builtin/builtin-tools";
export { ToolsModule } from "./tools.module";
