export { SimpleMemory } from "./simple.memory";
export { WindowBufferMemory, DEFAULT_WINDOW_SIZE } from "./window-buffer.memory";
export { DummyMemory } from "./dummy.memory";
export { MemoryFactory, type CreateMemoryOptions, type MemoryKind } from "./memory.factory";
export { MemoryModule } from "./memory.module";
