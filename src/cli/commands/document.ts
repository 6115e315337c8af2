import { budgetDocument, computeEffectiveBudget, textLength } from "../../context-budget";
import { logger } from "../../logger";
import { loadSettings, readInput, type BudgetFlagOptions } from "../options";

export async function documentCommand(file: string | undefined, options: BudgetFlagOptions) {
  const settings = loadSettings(options);
  if (!settings) {
    process.exitCode = 1;
    return;
  }

  try {
    const text = readInput(file);
    const output = budgetDocument(text, settings.budget);
    process.stdout.write(output);
    if (output !== text) {
      logger.info(
        {
          charsBefore: textLength(text),
          charsAfter: textLength(output),
          effectiveBudget: computeEffectiveBudget(settings.budget),
        },
        "Truncated document",
      );
    }
  } catch (error) {
    logger.error({ err: error, file: file ?? "-" }, "Failed to budget document");
    process.exitCode = 1;
  }
}
