/**
 * Message shapes used by the context budgeting helpers.
 */

/** Role that is pinned ahead of conversational turns */
export const SYSTEM_ROLE = "system";

/** A chat message as it comes from the caller; any field may be absent */
export type MessageInput = {
  role?: string | null;
  content?: string | null;
};

/** Normalized, immutable chat message */
export type Message = {
  readonly role: string;
  readonly content: string;
};

function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/**
 * Copy a loose message into a normalized one.
 * Missing or non-string fields become empty strings.
 */
export function normalizeMessage(input: MessageInput | null | undefined): Message {
  if (!input) {
    return { role: "", content: "" };
  }
  return { role: asString(input.role), content: asString(input.content) };
}

export function normalizeMessages(
  inputs: ReadonlyArray<MessageInput | null | undefined>,
): Message[] {
  return inputs.map((input) => normalizeMessage(input));
}

export function isSystemMessage(message: Message): boolean {
  return message.role === SYSTEM_ROLE;
}
