import { Injectable } from "@nestjs/common";
import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import { ToolError, type Tool } from "@promptweave/types";
import { normalizeToolName, parseToolInput } from "./tool-input";

export interface ToolCallRequest {
  id: string;
  tool: string;
  input: string;
}

export interface ToolCallOptions {
  signal?: AbortSignal;
}

interface RegisteredTool {
  tool: Tool;
  inputValidator?: ValidateFunction;
}

function paramString(error: ErrorObject, key: string): string | undefined {
  const value: unknown = Reflect.get(error.params, key);
  return typeof value === "string" ? value : undefined;
}

function fieldOf(error: ErrorObject, extra?: string): string {
  const segments = error.instancePath
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.replace(/~1/g, "/").replace(/~0/g, "~"));
  if (extra) {
    segments.push(extra);
  }
  return segments.length > 0 ? segments.join(".") : "input";
}

function describeError(error: ErrorObject): string {
  switch (error.keyword) {
    case "required": {
      const missing = paramString(error, "missingProperty");
      return `Field ${fieldOf(error, missing)} is required but missing`;
    }
    case "additionalProperties": {
      const extra = paramString(error, "additionalProperty");
      return `Field ${fieldOf(error, extra)} is not supported`;
    }
    case "enum": {
      const values: unknown = Reflect.get(error.params, "allowedValues");
      const allowed = Array.isArray(values) ? values.map(String).join(", ") : undefined;
      return allowed
        ? `Field ${fieldOf(error)} must be one of: ${allowed}`
        : `Field ${fieldOf(error)} ${error.message ?? "is invalid"}`;
    }
    default:
      return `Field ${fieldOf(error)} ${error.message ?? "is invalid"}`;
  }
}

function formatErrors(validator: ValidateFunction): string {
  return (validator.errors ?? []).map(describeError).join("; ") || "unknown error";
}

/**
 * Holds the tools an agent may call, keyed by normalised name. Immutable
 * during an invocation; usage accounting lives with the caller.
 */
export class ToolRegistry {
  private readonly ajv = new Ajv({ allErrors: true, strict: false });
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(tools: readonly Tool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: Tool): void {
    const inputValidator = tool.inputSchema
      ? this.ajv.compile(tool.inputSchema)
      : undefined;
    this.tools.set(normalizeToolName(tool.name), { tool, inputValidator });
  }

  unregister(name: string): void {
    this.tools.delete(normalizeToolName(name));
  }

  get(name: string): Tool | undefined {
    return this.tools.get(normalizeToolName(name))?.tool;
  }

  has(name: string): boolean {
    return this.tools.has(normalizeToolName(name));
  }

  list(): Tool[] {
    return Array.from(this.tools.values(), (entry) => entry.tool);
  }

  names(): string[] {
    return this.list().map((tool) => tool.name);
  }

  /** One `> name: description` line per tool, as rendered into prompts. */
  describe(): string {
    return this.list()
      .map((tool) => `> ${tool.name}: ${tool.description}`)
      .join("\n");
  }

  async execute(request: ToolCallRequest, options: ToolCallOptions = {}): Promise<string> {
    const entry = this.tools.get(normalizeToolName(request.tool));
    if (!entry) {
      throw new ToolError(request.tool, `Unknown tool: ${request.tool}`);
    }

    const { tool, inputValidator } = entry;
    const parsed = parseToolInput(request.input);

    if (inputValidator && !inputValidator(parsed.arguments)) {
      throw new ToolError(
        tool.name,
        `Validation failed for tool ${tool.name}: ${formatErrors(inputValidator)}`
      );
    }

    try {
      return await tool.call(parsed.input, {
        actionId: request.id,
        arguments: parsed.arguments,
        signal: options.signal,
      });
    } catch (error) {
      if (error instanceof ToolError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ToolError(tool.name, reason, error);
    }
  }
}

@Injectable()
export class ToolRegistryFactory {
  create(tools: readonly Tool[] = []): ToolRegistry {
    return new ToolRegistry(tools);
  }
}
