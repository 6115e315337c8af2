import { computeEffectiveBudget, resolveBudgetConfig, type BudgetConfig } from "./policy";
import { textLength, truncateText } from "./truncate";

/**
 * Fit a single long string (no chat framing) into the effective budget.
 */
export function budgetDocument(text: string, config?: Partial<BudgetConfig>): string {
  return truncateText(text, computeEffectiveBudget(resolveBudgetConfig(config)));
}

/**
 * Yield the document in consecutive slices of `chunkSize` characters
 * (code points). Sizes below 1 are treated as 1.
 */
export function* chunkText(text: string, chunkSize: number): Generator<string> {
  const requested = Number.isFinite(chunkSize)
    ? Math.floor(chunkSize)
    : chunkSize > 0
      ? textLength(text)
      : 1;
  const size = Math.max(1, requested);
  const chars = Array.from(text);
  for (let i = 0; i < chars.length; i += size) {
    yield chars.slice(i, i + size).join("");
  }
}
