import { InvalidArgumentError } from "commander";
import fs from "node:fs";
import { loadConfig, resolveAppSettings, type AppSettings } from "../config";
import { configureLogger, logger } from "../logger";

/** Budget flags shared by `trim` and `document` */
export type BudgetFlagOptions = {
  config?: string;
  charLimit?: number;
  safetyRatio?: number;
  overhead?: number;
  /** commander sets this to false for --no-truncate */
  truncate?: boolean;
  keepSystem?: number;
};

export function parseIntegerOption(value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return Number.parseInt(trimmed, 10);
}

export function parseRatioOption(value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

/**
 * Load the config file, apply its logging level, and layer CLI flags on top.
 * Returns undefined (after logging) when the config cannot be loaded.
 */
export function loadSettings(options: BudgetFlagOptions): AppSettings | undefined {
  const result = loadConfig(options.config);
  if (!result.success) {
    logger.error({ path: result.path, errors: result.errors }, "Failed to load configuration");
    return undefined;
  }
  configureLogger(result.config?.logging?.level);
  logger.debug({ path: result.path, source: result.source }, "Loaded configuration");

  return resolveAppSettings(result.config, {
    budget: {
      charLimit: options.charLimit,
      safetyRatio: options.safetyRatio,
      extraOverhead: options.overhead,
      truncateLastIfNeeded: options.truncate === false ? false : undefined,
    },
    keepLastNSystem: options.keepSystem,
  });
}

/** Read a file, or stdin when no file (or `-`) is given */
export function readInput(file?: string): string {
  if (!file || file === "-") {
    return fs.readFileSync(0, "utf-8");
  }
  return fs.readFileSync(file, "utf-8");
}
