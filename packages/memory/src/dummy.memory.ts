import type { Memory, Message } from "@promptweave/types";

/** Remembers nothing: history is always empty and saves are dropped. */
export class DummyMemory implements Memory {
  async load(): Promise<readonly Message[]> {
    return [];
  }

  async save(_human: Message, _ai: Message): Promise<void> {}

  async clear(): Promise<void> {}
}
