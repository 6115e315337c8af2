import { logger } from "../logger";
import type { BudgetConfig } from "./policy";
import { rollupHistoryAsync, type AsyncSummarizer, DEFAULT_ROLLUP_KEEP_LAST_N } from "./rollup";
import { budgetMessagesWithStats, DEFAULT_KEEP_LAST_N_SYSTEM, type BudgetResult } from "./select";
import type { MessageInput } from "./types";

export type PrepareConversationParams = {
  messages: ReadonlyArray<MessageInput | null | undefined>;
  budget?: Partial<BudgetConfig>;
  keepLastNSystem?: number;
  /** Roll older history into a summary before budgeting */
  rollup?: {
    summarize: AsyncSummarizer;
    keepLastN?: number;
  };
};

/**
 * Pre-flight step before sending a conversation to a provider:
 * optional rollup, then budgeting.
 */
export async function prepareConversation(params: PrepareConversationParams): Promise<BudgetResult> {
  let messages = params.messages;

  if (params.rollup) {
    const keepLastN = params.rollup.keepLastN ?? DEFAULT_ROLLUP_KEEP_LAST_N;
    const before = messages.length;
    messages = await rollupHistoryAsync(messages, params.rollup.summarize, keepLastN);
    if (messages.length !== before) {
      logger.debug({ before, after: messages.length, keepLastN }, "Rolled up conversation history");
    }
  }

  const result = budgetMessagesWithStats(
    messages,
    params.budget,
    params.keepLastNSystem ?? DEFAULT_KEEP_LAST_N_SYSTEM,
  );
  logger.debug({ stats: result.stats }, "Budgeted conversation");
  return result;
}
