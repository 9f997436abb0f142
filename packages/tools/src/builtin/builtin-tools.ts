import type { Tool } from "@promptweave/types";
import {
  createCommandExecutorTool,
  type CommandExecutorOptions,
} from "./command-executor";

export interface BuiltinToolOptions {
  commandExecutor?: CommandExecutorOptions | false;
}

export function createBuiltinTools(options: BuiltinToolOptions = {}): Tool[] {
  const tools: Tool[] = [];
  if (options.commandExecutor !== false) {
    tools.push(createCommandExecutorTool(options.commandExecutor ?? {}));
  }
  return tools;
}
