import { isDeepStrictEqual } from "util";

export type MessageRole = "system" | "human" | "ai" | "tool";

export const MESSAGE_ROLES: readonly MessageRole[] = [
  "system",
  "human",
  "ai",
  "tool",
];

export type MessageMetadata = Readonly<Record<string, unknown>>;

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly metadata: MessageMetadata;
}

export interface MessageInit {
  role: MessageRole;
  content: string;
  metadata?: Record<string, unknown>;
}

/**
 * Builds a frozen message. Metadata is copied so later mutation of the
 * source object cannot leak into the message.
 */
export function createMessage(init: MessageInit): Message {
  return Object.freeze({
    role: init.role,
    content: init.content,
    metadata: Object.freeze({ ...(init.metadata ?? {}) }),
  });
}

export const systemMessage = (
  content: string,
  metadata?: Record<string, unknown>
): Message => createMessage({ role: "system", content, metadata });

export const humanMessage = (
  content: string,
  metadata?: Record<string, unknown>
): Message => createMessage({ role: "human", content, metadata });

export const aiMessage = (
  content: string,
  metadata?: Record<string, unknown>
): Message => createMessage({ role: "ai", content, metadata });

export const toolMessage = (
  content: string,
  metadata?: Record<string, unknown>
): Message => createMessage({ role: "tool", content, metadata });

export function isMessageRole(value: unknown): value is MessageRole {
  return (
    typeof value === "string" &&
    MESSAGE_ROLES.some((role) => role === value)
  );
}

export function isMessage(value: unknown): value is Message {
  return (
    typeof value === "object" &&
    value !== null &&
    "role" in value &&
    isMessageRole(value.role) &&
    "content" in value &&
    typeof value.content === "string" &&
    "metadata" in value &&
    typeof value.metadata === "object" &&
    value.metadata !== null
  );
}

export function isMessageList(value: unknown): value is readonly Message[] {
  return Array.isArray(value) && value.every(isMessage);
}

/** Value equality; metadata key order is irrelevant. */
export function messagesEqual(left: Message, right: Message): boolean {
  return (
    left.role === right.role &&
    left.content === right.content &&
    isDeepStrictEqual({ ...left.metadata }, { ...right.metadata })
  );
}

export function formatMessageLine(message: Message): string {
  return `${message.role}: ${message.content}`;
}

export function messagesToText(messages: readonly Message[]): string {
  return messages.map(formatMessageLine).join("\n");
}
