import { execFile } from "child_process";
import path from "path";
import util from "util";
import { ToolError, type Tool } from "@promptweave/types";

const execFileAsync = util.promisify(execFile);
const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_STDIO_BYTES = 512_000;

export interface CommandInput {
  cmd: string;
  args: string[];
}

export interface DisallowedCommand {
  cmd: string;
  /** Blocked when the call carries all of these arguments; empty blocks the command. */
  args?: string[];
}

export interface CommandExecutorOptions {
  platform?: string;
  cwd?: string;
  timeoutMs?: number;
  disallowedCommands?: DisallowedCommand[];
}

function readCommands(args: Readonly<Record<string, unknown>>): CommandInput[] {
  const commands = args.commands;
  if (!Array.isArray(commands)) {
    throw new ToolError("command_executor", 'Input must be an object with a "commands" array');
  }

  return commands.map((entry: unknown, index) => {
    if (typeof entry !== "object" || entry === null || !("cmd" in entry)) {
      throw new ToolError("command_executor", `Command ${index} is missing "cmd"`);
    }
    const cmd = entry.cmd;
    const rawArgs = "args" in entry ? entry.args : [];
    if (typeof cmd !== "string" || !Array.isArray(rawArgs)) {
      throw new ToolError("command_executor", `Command ${index} is malformed`);
    }
    return { cmd, args: rawArgs.map((arg: unknown) => String(arg)) };
  });
}

function findDisallowed(
  command: CommandInput,
  disallowed: readonly DisallowedCommand[]
): DisallowedCommand | undefined {
  return disallowed.find(
    (rule) =>
      rule.cmd === command.cmd &&
      (rule.args ?? []).every((arg) => command.args.includes(arg))
  );
}

/** Runs terminal commands one after another and reports each one's output. */
export function createCommandExecutorTool(options: CommandExecutorOptions = {}): Tool {
  const platform = options.platform ?? process.platform;
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const disallowed = options.disallowedCommands ?? [];

  return {
    name: "command_executor",
    description:
      `Runs commands on a ${platform} terminal. ` +
      'Input: {"commands": [{"cmd": "ls", "args": ["-la"]}]}.',
    inputSchema: {
      type: "object",
      properties: {
        commands: {
          type: "array",
          minItems: 1,
          items: {
            type: "object",
            properties: {
              cmd: { type: "string", minLength: 1 },
              args: { type: "array", items: { type: "string" } },
            },
            required: ["cmd"],
          },
        },
      },
      required: ["commands"],
    },
    async call(_input, context) {
      const commands = readCommands(context.arguments);
      const blocked = commands
        .map((command) => ({ command, rule: findDisallowed(command, disallowed) }))
        .find((candidate) => candidate.rule);
      if (blocked) {
        throw new ToolError(
          "command_executor",
          `Command '${blocked.command.cmd}' with arguments [${blocked.command.args.join(", ")}] is disallowed`
        );
      }

      const reports: string[] = [];
      for (const command of commands) {
        const { stdout, stderr } = await execFileAsync(command.cmd, command.args, {
          cwd,
          timeout,
          maxBuffer: DEFAULT_MAX_STDIO_BYTES,
          signal: context.signal,
          encoding: "utf-8",
        });
        const output = stdout || stderr || "(no output)";
        reports.push(`$ ${[command.cmd, ...command.args].join(" ")}\n${output.trimEnd()}`);
      }
      return reports.join("\n\n");
    },
  };
}
