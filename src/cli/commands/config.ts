import { computeEffectiveBudget } from "../../context-budget";
import { loadSettings, type BudgetFlagOptions } from "../options";

export async function showConfig(options: Pick<BudgetFlagOptions, "config">) {
  const settings = loadSettings(options);
  if (!settings) {
    process.exitCode = 1;
    return;
  }
  console.log(
    JSON.stringify(
      { ...settings, effectiveBudget: computeEffectiveBudget(settings.budget) },
      null,
      2,
    ),
  );
}
