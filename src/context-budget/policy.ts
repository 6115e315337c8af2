/**
 * Budget policy: the provider's advertised character cap, the headroom kept
 * below it, and a fixed reservation for content added later.
 */

/** Character cap of the default provider (oca/gpt5) */
export const DEFAULT_CHAR_LIMIT = 1_088_000;

/** Keep ~13% headroom for provider overhead */
export const DEFAULT_SAFETY_RATIO = 0.87;

export type BudgetConfig = {
  charLimit: number;
  safetyRatio: number;
  /** Characters reserved for system/tool content added after budgeting */
  extraOverhead: number;
  /** Truncate the boundary message instead of dropping it */
  truncateLastIfNeeded: boolean;
};

export const DEFAULT_BUDGET_CONFIG: Readonly<BudgetConfig> = Object.freeze({
  charLimit: DEFAULT_CHAR_LIMIT,
  safetyRatio: DEFAULT_SAFETY_RATIO,
  extraOverhead: 0,
  truncateLastIfNeeded: true,
});

/**
 * Merge overrides onto the defaults. No validation: out-of-range numbers are
 * legal and only push the effective budget toward zero.
 */
export function resolveBudgetConfig(overrides?: Partial<BudgetConfig>): BudgetConfig {
  return {
    charLimit: overrides?.charLimit ?? DEFAULT_BUDGET_CONFIG.charLimit,
    safetyRatio: overrides?.safetyRatio ?? DEFAULT_BUDGET_CONFIG.safetyRatio,
    extraOverhead: overrides?.extraOverhead ?? DEFAULT_BUDGET_CONFIG.extraOverhead,
    truncateLastIfNeeded:
      overrides?.truncateLastIfNeeded ?? DEFAULT_BUDGET_CONFIG.truncateLastIfNeeded,
  };
}

/**
 * floor(charLimit * safetyRatio) - max(extraOverhead, 0).
 * May be zero or negative; a non-finite result counts as 0.
 */
export function computeEffectiveBudget(config: BudgetConfig): number {
  const overhead = Number.isFinite(config.extraOverhead) ? Math.max(config.extraOverhead, 0) : 0;
  const budget = Math.floor(config.charLimit * config.safetyRatio) - overhead;
  return Number.isFinite(budget) ? budget : 0;
}
