/**
 * Message selection under a character budget.
 *
 * Keeps the last N system messages pinned at the front, then walks the
 * conversational messages from newest to oldest until one no longer fits.
 * Only the newest conversational message (and the first pinned message that
 * overflows) may be truncated instead of dropped.
 */

import { computeEffectiveBudget, resolveBudgetConfig, type BudgetConfig } from "./policy";
import { messageSize, messagesSize } from "./size";
import { textLength, truncateText } from "./truncate";
import { isSystemMessage, normalizeMessage, type Message, type MessageInput } from "./types";

/** Default number of system messages to pin */
export const DEFAULT_KEEP_LAST_N_SYSTEM = 1;

export type BudgetStats = {
  effectiveBudget: number;
  charsBefore: number;
  charsAfter: number;
  /** Input messages absent from the output */
  droppedCount: number;
  /** Output messages whose content was shortened */
  truncatedCount: number;
  /** System messages present in the output */
  pinnedCount: number;
};

export type BudgetResult = {
  messages: Message[];
  stats: BudgetStats;
};

type Accepted = {
  message: Message;
  truncated: boolean;
};

function normalizeCount(value: number): number {
  if (!Number.isFinite(value)) {
    return value > 0 ? Number.MAX_SAFE_INTEGER : 0;
  }
  return Math.max(0, Math.floor(value));
}

/**
 * Shorten a message so that it fits in `room` characters, reserving its role.
 * Returns undefined when nothing of the content would survive.
 */
function truncateToFit(message: Message, room: number): Message | undefined {
  const allowed = Math.max(0, room - textLength(message.role));
  if (allowed <= 0) {
    return undefined;
  }
  return { role: message.role, content: truncateText(message.content, allowed) };
}

function selectConversational(
  conversational: Message[],
  startTotal: number,
  maxInput: number,
  config: BudgetConfig,
): Accepted[] {
  const out: Accepted[] = [];
  let total = startTotal;

  for (let idx = conversational.length - 1; idx >= 0; idx--) {
    const message = conversational[idx];
    const size = messageSize(message);
    if (total + size <= maxInput) {
      out.push({ message, truncated: false });
      total += size;
      continue;
    }
    // Only the most recent message may be partially included.
    if (idx === conversational.length - 1 && config.truncateLastIfNeeded && message.content) {
      const shortened = truncateToFit(message, maxInput - total);
      if (shortened) {
        out.push({ message: shortened, truncated: true });
      }
    }
    break;
  }

  return out.reverse();
}

function selectPinned(pinned: Message[], maxInput: number, config: BudgetConfig): Accepted[] {
  const out: Accepted[] = [];
  let total = 0;

  for (const message of pinned) {
    const size = messageSize(message);
    if (total + size <= maxInput) {
      out.push({ message, truncated: false });
      total += size;
      continue;
    }
    // Older pinned messages win here, unlike the conversational walk; this is
    // intentional. TODO: decide whether newer pinned messages should take
    // priority before changing it.
    if (config.truncateLastIfNeeded && message.content) {
      const shortened = truncateToFit(message, maxInput - total);
      if (shortened) {
        out.push({ message: shortened, truncated: true });
      }
    }
    break;
  }

  return out;
}

/**
 * Return a trimmed copy of `messages` within the effective budget, with stats.
 * Never throws; a non-positive budget yields an empty (or near-empty) result.
 */
export function budgetMessagesWithStats(
  messages: ReadonlyArray<MessageInput | null | undefined>,
  config?: Partial<BudgetConfig>,
  keepLastNSystem: number = DEFAULT_KEEP_LAST_N_SYSTEM,
): BudgetResult {
  const resolved = resolveBudgetConfig(config);
  const maxInput = computeEffectiveBudget(resolved);
  const normalized = messages.map((message) => normalizeMessage(message));

  const systemMessages = normalized.filter((message) => isSystemMessage(message));
  const conversational = normalized.filter((message) => !isSystemMessage(message));

  const keep = normalizeCount(keepLastNSystem);
  const pinned = keep > 0 ? systemMessages.slice(-keep) : [];

  const keptConversational = selectConversational(
    conversational,
    messagesSize(pinned),
    maxInput,
    resolved,
  );
  const keptPinned = selectPinned(pinned, maxInput, resolved);

  const kept = [...keptPinned, ...keptConversational];
  const output = kept.map((entry) => entry.message);

  return {
    messages: output,
    stats: {
      effectiveBudget: maxInput,
      charsBefore: messagesSize(normalized),
      charsAfter: messagesSize(output),
      droppedCount: normalized.length - output.length,
      truncatedCount: kept.filter((entry) => entry.truncated).length,
      pinnedCount: keptPinned.length,
    },
  };
}

/**
 * Return a trimmed copy of `messages` that stays within the effective budget.
 * Input messages are never mutated.
 */
export function budgetMessages(
  messages: ReadonlyArray<MessageInput | null | undefined>,
  config?: Partial<BudgetConfig>,
  keepLastNSystem: number = DEFAULT_KEEP_LAST_N_SYSTEM,
): Message[] {
  return budgetMessagesWithStats(messages, config, keepLastNSystem).messages;
}
