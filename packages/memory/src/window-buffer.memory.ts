import type { Message } from "@promptweave/types";
import { SimpleMemory } from "./simple.memory";

export const DEFAULT_WINDOW_SIZE = 10;

/** Keeps only the most recent `windowSize` messages. */
export class WindowBufferMemory extends SimpleMemory {
  readonly windowSize: number;

  constructor(windowSize: number = DEFAULT_WINDOW_SIZE, initial: readonly Message[] = []) {
    if (!Number.isInteger(windowSize) || windowSize <= 0) {
      throw new RangeError("windowSize must be a positive integer");
    }
    super(initial.slice(-windowSize));
    this.windowSize = windowSize;
  }

  override async save(human: Message, ai: Message): Promise<void> {
    this.messages = [...this.messages, human, ai].slice(-this.windowSize);
  }
}
