import { describe, expect, it } from "vitest";
import {
  aiMessage,
  chatPrompt,
  createMessage,
  humanMessage,
  isMessage,
  isMessageList,
  messagesEqual,
  promptToMessages,
  promptToString,
  stringPrompt,
  systemMessage,
} from "@promptweave/types";

describe("messages", () => {
  it("freezes messages and copies metadata", () => {
    const metadata: Record<string, unknown> = { source: "test" };
    const message = createMessage({ role: "human", content: "hi", metadata });
    metadata.source = "changed";

    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.metadata)).toBe(true);
    expect(message.metadata).toEqual({ source: "test" });
  });

  it("compares messages by value regardless of metadata key order", () => {
    const left = aiMessage("done", { a: 1, b: [1, 2] });
    const right = aiMessage("done", { b: [1, 2], a: 1 });

    expect(messagesEqual(left, right)).toBe(true);
    expect(messagesEqual(left, humanMessage("done", { a: 1, b: [1, 2] }))).toBe(false);
    expect(messagesEqual(left, aiMessage("done", { a: 2, b: [1, 2] }))).toBe(false);
  });

  it("recognises message values", () => {
    expect(isMessage(systemMessage("rules"))).toBe(true);
    expect(isMessage({ role: "user", content: "x", metadata: {} })).toBe(false);
    expect(isMessageList([humanMessage("a"), aiMessage("b")])).toBe(true);
    expect(isMessageList(["a"])).toBe(false);
  });
});

describe("prompt values", () => {
  it("wraps a string prompt as a single human message", () => {
    const messages = promptToMessages(stringPrompt("Summarise this"));

    expect(messages).toHaveLength(1);
    expect(messages[0]?.role).toBe("human");
    expect(messages[0]?.content).toBe("Summarise this");
  });

  it("renders chat prompts as role-prefixed lines", () => {
    const prompt = chatPrompt([systemMessage("Be brief."), humanMessage("Hello")]);

    expect(promptToString(prompt)).toBe("system: Be brief.\nhuman: Hello");
    expect(promptToMessages(prompt)).toEqual(prompt.messages);
  });
});
