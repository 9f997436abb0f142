import { humanMessage, messagesToText, type Message } from "./messages";

export interface StringPrompt {
  readonly kind: "string";
  readonly text: string;
}

export interface ChatPrompt {
  readonly kind: "chat";
  readonly messages: readonly Message[];
}

/** What a chain hands to a model, independent of how it was produced. */
export type PromptValue = StringPrompt | ChatPrompt;

export const stringPrompt = (text: string): StringPrompt =>
  Object.freeze({ kind: "string", text });

export const chatPrompt = (messages: readonly Message[]): ChatPrompt =>
  Object.freeze({ kind: "chat", messages: Object.freeze([...messages]) });

export function promptToMessages(prompt: PromptValue): readonly Message[] {
  return prompt.kind === "chat" ? prompt.messages : [humanMessage(prompt.text)];
}

export function promptToString(prompt: PromptValue): string {
  return prompt.kind === "string" ? prompt.text : messagesToText(prompt.messages);
}
