import type { Message } from "./messages";

export interface Memory {
  /** Current history, oldest first. */
  load(): Promise<readonly Message[]>;
  save(human: Message, ai: Message): Promise<void>;
  clear(): Promise<void>;
}
