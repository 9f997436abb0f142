import { Inject, Injectable, Optional } from "@nestjs/common";
import { ConfigStore } from "@promptweave/config";
import type { Memory, Message } from "@promptweave/types";
import { DummyMemory } from "./dummy.memory";
import { SimpleMemory } from "./simple.memory";
import { DEFAULT_WINDOW_SIZE, WindowBufferMemory } from "./window-buffer.memory";

export type MemoryKind = "simple" | "window" | "none";

export interface CreateMemoryOptions {
  windowSize?: number;
  initial?: readonly Message[];
}

@Injectable()
export class MemoryFactory {
  constructor(
    @Optional()
    @Inject(ConfigStore)
    private readonly configStore?: ConfigStore,
  ) {}

  create(kind: MemoryKind = "window", options: CreateMemoryOptions = {}): Memory {
    switch (kind) {
      case "simple":
        return new SimpleMemory(options.initial);
      case "none":
        return new DummyMemory();
      case "window":
        return new WindowBufferMemory(
          options.windowSize ?? this.defaultWindowSize(),
          options.initial,
        );
    }
  }

  private defaultWindowSize(): number {
    return this.configStore?.getSnapshot().memory.windowSize ?? DEFAULT_WINDOW_SIZE;
  }
}
