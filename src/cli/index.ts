#!/usr/bin/env node
import { Command } from "commander";
import { APP_VERSION } from "../version";
import { parseIntegerOption, parseRatioOption } from "./options";

const program = new Command()
  .name("chat-budget")
  .description("Trim chat messages to fit a provider's character budget")
  .version(APP_VERSION);

function withBudgetOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "Config file path")
    .option("--char-limit <n>", "Provider character limit", parseIntegerOption)
    .option("--safety-ratio <r>", "Fraction of the limit to use", parseRatioOption)
    .option("--overhead <n>", "Characters reserved for content added later", parseIntegerOption)
    .option("--no-truncate", "Drop the boundary message instead of truncating it");
}

withBudgetOptions(
  program
    .command("trim [file]")
    .description("Trim a JSON message array (file or stdin) and print the result"),
)
  .option("--keep-system <n>", "Number of trailing system messages to pin", parseIntegerOption)
  .option("--stats", "Log selection statistics")
  .action(async (file: string | undefined, options) => {
    const { trimCommand } = await import("./commands/trim");
    await trimCommand(file, options);
  });

withBudgetOptions(
  program
    .command("document [file]")
    .description("Truncate plain text (file or stdin) to the effective budget"),
).action(async (file: string | undefined, options) => {
  const { documentCommand } = await import("./commands/document");
  await documentCommand(file, options);
});

program
  .command("config")
  .description("Validate the config file and print resolved settings")
  .option("-c, --config <path>", "Config file path")
  .action(async (options) => {
    const { showConfig } = await import("./commands/config");
    await showConfig(options);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
