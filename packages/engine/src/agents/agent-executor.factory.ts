import { Inject, Injectable, Optional } from "@nestjs/common";
import { ConfigStore } from "@promptweave/config";
import { LoggerService } from "@promptweave/io";
import { AgentExecutor, type AgentExecutorOptions } from "./agent-executor";
import {
  ConversationalAgent,
  type ConversationalAgentOptions,
} from "./conversational-agent";

export type ExecutorSettings = Omit<AgentExecutorOptions, "agent">;

@Injectable()
export class AgentExecutorFactory {
  constructor(
    @Inject(LoggerService) private readonly loggerService: LoggerService,
    @Optional()
    @Inject(ConfigStore)
    private readonly configStore: ConfigStore = new ConfigStore()
  ) {}

  createAgent(options: ConversationalAgentOptions): ConversationalAgent {
    const { chain } = this.configStore.getSnapshot();
    return new ConversationalAgent({
      ...options,
      callOptions: { ...chain.callOptions, ...options.callOptions },
      logger: options.logger ?? this.loggerService.getLogger("conversational-agent"),
    });
  }

  /** Explicit settings win over the `agent` section of the configuration. */
  createExecutor(options: AgentExecutorOptions): AgentExecutor {
    const { agent } = this.configStore.getSnapshot();
    return new AgentExecutor({
      ...options,
      maxIterations: options.maxIterations ?? agent.maxIterations,
      timeoutMs: options.timeoutMs ?? agent.timeoutMs,
      maxParseRetries: options.maxParseRetries ?? agent.maxParseRetries,
      maxToolErrors: options.maxToolErrors ?? agent.maxToolErrors,
      parallelToolCalls: options.parallelToolCalls ?? agent.parallelToolCalls,
      logger: options.logger ?? this.loggerService.getLogger("agent-executor"),
    });
  }

  create(
    agentOptions: ConversationalAgentOptions,
    settings: ExecutorSettings = {}
  ): AgentExecutor {
    return this.createExecutor({ ...settings, agent: this.createAgent(agentOptions) });
  }
}
