import { Module } from "@nestjs/common";
import { MemoryFactory } from "./memory.factory";

@Module({
  providers: [MemoryFactory],
  exports: [MemoryFactory],
})
export class MemoryModule {}
