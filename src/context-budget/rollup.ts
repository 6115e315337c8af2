/**
 * History rollup: replace older turns with one summary message and keep the
 * recent tail verbatim. Summarization itself is supplied by the caller.
 */

import { normalizeMessage, SYSTEM_ROLE, type Message, type MessageInput } from "./types";

/** Default number of recent messages kept verbatim */
export const DEFAULT_ROLLUP_KEEP_LAST_N = 6;

/** Label prepended to plain-text summaries */
export const SUMMARY_PREFIX = "Conversation memory (summarized):";

/** A summarizer returns either a ready-made message or the summary text */
export type SummaryOutput = MessageInput | string;

export type Summarizer = (head: readonly Message[]) => SummaryOutput;

export type AsyncSummarizer = (head: readonly Message[]) => SummaryOutput | Promise<SummaryOutput>;

/**
 * Build the memory message that stands in for summarized history.
 * A message without a role becomes a system message.
 */
export function createSummaryMessage(summary: SummaryOutput): Message {
  if (typeof summary === "string") {
    return { role: SYSTEM_ROLE, content: `${SUMMARY_PREFIX}\n${summary}` };
  }
  const normalized = normalizeMessage(summary);
  const role = summary.role === undefined || summary.role === null ? SYSTEM_ROLE : normalized.role;
  return { role, content: normalized.content };
}

type RollupSplit = {
  head: Message[];
  tail: Message[];
};

/** Returns undefined when the history is short enough to keep as-is */
function splitHistory(
  messages: ReadonlyArray<MessageInput | null | undefined>,
  keepLastN: number,
): RollupSplit | undefined {
  const keep = Number.isFinite(keepLastN) ? Math.max(0, Math.floor(keepLastN)) : 0;
  if (messages.length <= keep) {
    return undefined;
  }
  const cut = messages.length - keep;
  return {
    head: messages.slice(0, cut).map((message) => normalizeMessage(message)),
    tail: messages.slice(cut).map((message) => normalizeMessage(message)),
  };
}

/**
 * Summarize everything but the last `keepLastN` messages into one memory
 * message. Errors thrown by `summarize` propagate unchanged.
 */
export function rollupHistory(
  messages: ReadonlyArray<MessageInput | null | undefined>,
  summarize: Summarizer,
  keepLastN: number = DEFAULT_ROLLUP_KEEP_LAST_N,
): Message[] {
  const split = splitHistory(messages, keepLastN);
  if (!split) {
    return messages.map((message) => normalizeMessage(message));
  }
  return [createSummaryMessage(summarize(split.head)), ...split.tail];
}

/**
 * Same as {@link rollupHistory}, for summarizers that call a model.
 */
export async function rollupHistoryAsync(
  messages: ReadonlyArray<MessageInput | null | undefined>,
  summarize: AsyncSummarizer,
  keepLastN: number = DEFAULT_ROLLUP_KEEP_LAST_N,
): Promise<Message[]> {
  const split = splitHistory(messages, keepLastN);
  if (!split) {
    return messages.map((message) => normalizeMessage(message));
  }
  const summary = await summarize(split.head);
  return [createSummaryMessage(summary), ...split.tail];
}
