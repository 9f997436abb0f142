import { Module } from "@nestjs/common";
import { IoModule } from "@promptweave/io";
import { MemoryModule } from "@promptweave/memory";
import { TemplateModule } from "@promptweave/templates";
import { ToolsModule } from "@promptweave/tools";
import { AgentExecutorFactory } from "./agents/agent-executor.factory";
import { ChainFactory } from "./chains/chain.factory";

/**
 * Chain and agent factories. Configuration comes from a globally
 * registered `ConfigModule`, or the defaults when none is present.
 */
@Module({
  imports: [IoModule, TemplateModule, ToolsModule, MemoryModule],
  providers: [ChainFactory, AgentExecutorFactory],
  exports: [
    ChainFactory,
    AgentExecutorFactory,
    IoModule,
    TemplateModule,
    ToolsModule,
    MemoryModule,
  ],
})
export class EngineModule {}
