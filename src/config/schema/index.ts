import { z } from "zod";
import { BudgetSchema, RollupSchema, SelectionSchema } from "./budget";
import { LoggingSchema } from "./logging";

export const ChatBudgetConfigSchema = z
  .object({
    $schema: z.string().optional(),
    budget: BudgetSchema.optional(),
    selection: SelectionSchema.optional(),
    rollup: RollupSchema.optional(),
    logging: LoggingSchema.optional(),
  })
  .strict();

export type ChatBudgetConfig = z.infer<typeof ChatBudgetConfigSchema>;

export { BudgetSchema, RollupSchema, SelectionSchema } from "./budget";
export { LoggingSchema } from "./logging";
