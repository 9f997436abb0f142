import { Module } from "@nestjs/common";
import { ToolRegistryFactory } from "./tool-registry.service";

@Module({
  providers: [ToolRegistryFactory],
  exports: [ToolRegistryFactory],
})
export class ToolsModule {}
