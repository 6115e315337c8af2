import { resolveBudgetConfig, type BudgetConfig } from "../context-budget/policy";
import { DEFAULT_ROLLUP_KEEP_LAST_N } from "../context-budget/rollup";
import { DEFAULT_KEEP_LAST_N_SYSTEM } from "../context-budget/select";
import type { ChatBudgetConfig } from "./schema";

export type AppSettings = {
  budget: BudgetConfig;
  keepLastNSystem: number;
  rollupKeepLastN: number;
};

/**
 * Fill every unset config value with its default.
 * `overrides` (e.g. CLI flags) win over the file.
 */
export function resolveAppSettings(
  config: ChatBudgetConfig | undefined,
  overrides?: {
    budget?: Partial<BudgetConfig>;
    keepLastNSystem?: number;
  },
): AppSettings {
  return {
    budget: resolveBudgetConfig({
      charLimit: overrides?.budget?.charLimit ?? config?.budget?.charLimit,
      safetyRatio: overrides?.budget?.safetyRatio ?? config?.budget?.safetyRatio,
      extraOverhead: overrides?.budget?.extraOverhead ?? config?.budget?.extraOverhead,
      truncateLastIfNeeded:
        overrides?.budget?.truncateLastIfNeeded ?? config?.budget?.truncateLastIfNeeded,
    }),
    keepLastNSystem:
      overrides?.keepLastNSystem ??
      config?.selection?.keepLastNSystem ??
      DEFAULT_KEEP_LAST_N_SYSTEM,
    rollupKeepLastN: config?.rollup?.keepLastN ?? DEFAULT_ROLLUP_KEEP_LAST_N,
  };
}
