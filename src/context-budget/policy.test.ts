import { describe, expect, it } from "vitest";
import {
  computeEffectiveBudget,
  DEFAULT_BUDGET_CONFIG,
  DEFAULT_CHAR_LIMIT,
  DEFAULT_SAFETY_RATIO,
  resolveBudgetConfig,
} from "./policy";

describe("resolveBudgetConfig", () => {
  it("returns defaults when given undefined", () => {
    expect(resolveBudgetConfig()).toEqual({
      charLimit: DEFAULT_CHAR_LIMIT,
      safetyRatio: DEFAULT_SAFETY_RATIO,
      extraOverhead: 0,
      truncateLastIfNeeded: true,
    });
  });

  it("merges overrides with defaults", () => {
    const config = resolveBudgetConfig({ charLimit: 500, truncateLastIfNeeded: false });
    expect(config.charLimit).toBe(500);
    expect(config.truncateLastIfNeeded).toBe(false);
    expect(config.safetyRatio).toBe(0.87);
  });

  it("does not validate out-of-range values", () => {
    const config = resolveBudgetConfig({ charLimit: -1, safetyRatio: 3 });
    expect(config.charLimit).toBe(-1);
    expect(config.safetyRatio).toBe(3);
  });
});

describe("computeEffectiveBudget", () => {
  it("applies the safety ratio to the default limit", () => {
    expect(computeEffectiveBudget(DEFAULT_BUDGET_CONFIG)).toBe(946_560);
  });

  it("subtracts extra overhead", () => {
    expect(
      computeEffectiveBudget(
        resolveBudgetConfig({ charLimit: 100, safetyRatio: 0.5, extraOverhead: 20 }),
      ),
    ).toBe(30);
  });

  it("ignores negative overhead", () => {
    expect(
      computeEffectiveBudget(
        resolveBudgetConfig({ charLimit: 100, safetyRatio: 0.5, extraOverhead: -5 }),
      ),
    ).toBe(50);
  });

  it("can be zero or negative", () => {
    expect(computeEffectiveBudget(resolveBudgetConfig({ charLimit: 0 }))).toBe(0);
    expect(computeEffectiveBudget(resolveBudgetConfig({ charLimit: -10 }))).toBe(-9);
    expect(
      computeEffectiveBudget(resolveBudgetConfig({ charLimit: 10, safetyRatio: 1, extraOverhead: 15 })),
    ).toBe(-5);
  });

  it("treats a non-finite result as no room", () => {
    expect(computeEffectiveBudget(resolveBudgetConfig({ safetyRatio: Number.NaN }))).toBe(0);
  });
});
