import type { Memory, Message } from "@promptweave/types";

/** Unbounded in-process history. */
export class SimpleMemory implements Memory {
  protected messages: Message[];

  constructor(initial: readonly Message[] = []) {
    this.messages = [...initial];
  }

  async load(): Promise<readonly Message[]> {
    return [...this.messages];
  }

  async save(human: Message, ai: Message): Promise<void> {
    this.messages.push(human, ai);
  }

  async clear(): Promise<void> {
    this.messages = [];
  }
}
