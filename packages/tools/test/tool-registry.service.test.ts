import { describe, expect, it, vi } from "vitest";
import { ToolError, type Tool, type ToolContext } from "@promptweave/types";
import { ToolRegistry, ToolRegistryFactory } from "../src/tool-registry.service";

const echoTool: Tool = {
  name: "Echo",
  description: "Repeats its input.",
  async call(input) {
    return `echo: ${input}`;
  },
};

const lookupTool: Tool = {
  name: "lookup",
  description: "Finds a city population.",
  inputSchema: {
    type: "object",
    properties: {
      city: { type: "string" },
      units: { enum: ["people", "thousands"] },
    },
    required: ["city"],
    additionalProperties: false,
  },
  call: vi.fn(async (_input: string, context: ToolContext) => `population of ${String(context.arguments.city)}`),
};

describe("ToolRegistry", () => {
  it("looks tools up by normalised name", () => {
    const registry = new ToolRegistry([echoTool]);

    expect(registry.get("echo")).toBe(echoTool);
    expect(registry.get('"ECHO"')).toBe(echoTool);
    expect(registry.has("missing")).toBe(false);
    expect(registry.names()).toEqual(["Echo"]);
  });

  it("renders the tool catalogue", () => {
    const registry = new ToolRegistry([echoTool, lookupTool]);

    expect(registry.describe()).toBe(
      "> Echo: Repeats its input.\n> lookup: Finds a city population.",
    );
  });

  it("passes the parsed input and action id to the tool", async () => {
    const registry = new ToolRegistry([lookupTool]);

    const result = await registry.execute({
      id: "call-1",
      tool: "lookup",
      input: '{"city": "Oslo"}',
    });

    expect(result).toBe("population of Oslo");
    expect(lookupTool.call).toHaveBeenCalledWith('{"city": "Oslo"}', {
      actionId: "call-1",
      arguments: { city: "Oslo" },
      signal: undefined,
    });
  });

  it("reports schema violations as tool errors", async () => {
    const registry = new ToolRegistry([lookupTool]);

    const error = await registry
      .execute({ id: "a", tool: "lookup", input: '{"units": "miles", "extra": 1}' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ToolError);
    const message = error instanceof Error ? error.message : "";
    expect(message.startsWith("Validation failed for tool lookup: ")).toBe(true);
    expect(message).toContain("Field city is required but missing");
    expect(message).toContain("Field extra is not supported");
    expect(message).toContain("Field units must be one of: people, thousands");
  });

  it("wraps failures thrown by a tool", async () => {
    const failing: Tool = {
      name: "flaky",
      description: "Always fails.",
      async call() {
        throw new Error("upstream unavailable");
      },
    };
    const registry = new ToolRegistry([failing]);

    const error = await registry
      .execute({ id: "a", tool: "flaky", input: "x" })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ToolError);
    expect(error).toMatchObject({ tool: "flaky", message: "upstream unavailable" });
  });

  it("rejects unknown tools", async () => {
    await expect(
      new ToolRegistry().execute({ id: "a", tool: "nope", input: "" }),
    ).rejects.toThrow("Unknown tool: nope");
  });

  it("unregisters tools", () => {
    const registry = new ToolRegistryFactory().create([echoTool]);
    registry.unregister("ECHO");

    expect(registry.list()).toEqual([]);
  });
});
