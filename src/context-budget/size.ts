import { textLength } from "./truncate";
import { normalizeMessage, type MessageInput } from "./types";

/**
 * Approximate character cost of one message: role length plus content length,
 * counted in code points.
 * Providers count more than this (JSON framing, hidden prompts), which is what
 * the policy's safety ratio is for.
 */
export function messageSize(message: MessageInput | null | undefined): number {
  const { role, content } = normalizeMessage(message);
  return textLength(role) + textLength(content);
}

export function messagesSize(messages: ReadonlyArray<MessageInput | null | undefined>): number {
  return messages.reduce((sum, message) => sum + messageSize(message), 0);
}
