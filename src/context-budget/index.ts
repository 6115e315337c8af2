/**
 * Context budgeting exports.
 *
 * Provides utilities for:
 * - Character size estimation of chat messages
 * - Budget policy with safety headroom
 * - Marker-aware text truncation
 * - Recency-first message selection with pinned system messages
 * - History rollup through a caller-supplied summarizer
 */

export { SYSTEM_ROLE, normalizeMessage, normalizeMessages, isSystemMessage } from "./types";
export type { Message, MessageInput } from "./types";

export { messageSize, messagesSize } from "./size";

export {
  DEFAULT_CHAR_LIMIT,
  DEFAULT_SAFETY_RATIO,
  DEFAULT_BUDGET_CONFIG,
  resolveBudgetConfig,
  computeEffectiveBudget,
} from "./policy";
export type { BudgetConfig } from "./policy";

export { DEFAULT_TRUNCATION_MARKER, textLength, truncateText } from "./truncate";

export { DEFAULT_KEEP_LAST_N_SYSTEM, budgetMessages, budgetMessagesWithStats } from "./select";
export type { BudgetStats, BudgetResult } from "./select";

export {
  DEFAULT_ROLLUP_KEEP_LAST_N,
  SUMMARY_PREFIX,
  createSummaryMessage,
  rollupHistory,
  rollupHistoryAsync,
} from "./rollup";
export type { Summarizer, AsyncSummarizer, SummaryOutput } from "./rollup";

export { budgetDocument, chunkText } from "./document";

export { prepareConversation } from "./prepare";
export type { PrepareConversationParams } from "./prepare";
