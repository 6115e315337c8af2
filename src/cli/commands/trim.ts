import { z } from "zod";
import { budgetMessagesWithStats, type BudgetResult } from "../../context-budget";
import type { AppSettings } from "../../config";
import { logger } from "../../logger";
import { loadSettings, readInput, type BudgetFlagOptions } from "../options";

const MessageFileSchema = z.array(
  z
    .object({
      role: z.string().nullish(),
      content: z.string().nullish(),
    })
    .passthrough(),
);

export type TrimCommandOptions = BudgetFlagOptions & {
  stats?: boolean;
};

/**
 * Parse a JSON array of chat messages.
 * Throws with a readable message when the payload is not one.
 */
export function parseMessagesJson(raw: string) {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Input is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  const result = MessageFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Input is not a message array: ${issues.join("; ")}`);
  }
  return result.data;
}

export function runTrim(raw: string, settings: AppSettings): BudgetResult {
  return budgetMessagesWithStats(parseMessagesJson(raw), settings.budget, settings.keepLastNSystem);
}

export async function trimCommand(file: string | undefined, options: TrimCommandOptions) {
  const settings = loadSettings(options);
  if (!settings) {
    process.exitCode = 1;
    return;
  }

  try {
    const result = runTrim(readInput(file), settings);
    console.log(JSON.stringify(result.messages, null, 2));
    if (options.stats) {
      logger.info({ stats: result.stats }, "Trimmed conversation");
    } else if (result.stats.droppedCount > 0 || result.stats.truncatedCount > 0) {
      logger.debug({ stats: result.stats }, "Trimmed conversation");
    }
  } catch (error) {
    logger.error({ err: error, file: file ?? "-" }, "Failed to trim messages");
    process.exitCode = 1;
  }
}
