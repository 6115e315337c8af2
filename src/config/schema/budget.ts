import { z } from "zod";

export const BudgetSchema = z
  .object({
    // Provider's advertised character cap
    charLimit: z.number().int().nonnegative().optional(),
    safetyRatio: z.number().positive().max(1).optional(),
    extraOverhead: z.number().int().nonnegative().optional(),
    truncateLastIfNeeded: z.boolean().optional(),
  })
  .strict();

export const SelectionSchema = z
  .object({
    keepLastNSystem: z.number().int().nonnegative().optional(),
  })
  .strict();

export const RollupSchema = z
  .object({
    keepLastN: z.number().int().nonnegative().optional(),
  })
  .strict();
