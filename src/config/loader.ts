import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ChatBudgetConfigSchema, type ChatBudgetConfig } from "./schema";

export type ConfigSource = "file" | "defaults";

export interface ConfigLoadResult {
  success: boolean;
  config?: ChatBudgetConfig;
  errors?: string[];
  path: string;
  source: ConfigSource;
}

function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function defaultConfigPath(): string {
  return path.join(os.homedir(), ".chat-budget", "config.jsonc");
}

/**
 * Resolve which config file to read and whether the caller asked for it.
 * An explicit path (argument or CHAT_BUDGET_CONFIG) must exist; the default may not.
 */
export function resolveConfigPath(customPath?: string): { path: string; explicit: boolean } {
  if (customPath) {
    return { path: path.resolve(expandHomePath(customPath)), explicit: true };
  }
  const envPath = process.env.CHAT_BUDGET_CONFIG;
  if (envPath) {
    return { path: path.resolve(expandHomePath(envPath)), explicit: true };
  }
  return { path: defaultConfigPath(), explicit: false };
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const envPath = path.join(path.dirname(resolvedPath), ".env");
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false });
  if (result.error) {
    throw result.error;
  }
}

function formatParseErrors(raw: string, errors: ParseError[]): string[] {
  return errors.map((error) => {
    const line = raw.slice(0, error.offset).split("\n").length;
    return `line ${line}: ${printParseErrorCode(error.error)}`;
  });
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolved = resolveConfigPath(configPath);
  if (!fs.existsSync(resolved.path)) {
    if (!resolved.explicit) {
      return { success: true, config: {}, path: resolved.path, source: "defaults" };
    }
    return {
      success: false,
      errors: [`Config file not found: ${resolved.path}`],
      path: resolved.path,
      source: "file",
    };
  }

  try {
    loadConfigLocalEnv(resolved.path);
    const raw = fs.readFileSync(resolved.path, "utf-8");
    const parseErrors: ParseError[] = [];
    const parsed: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
    if (parseErrors.length > 0) {
      return {
        success: false,
        errors: formatParseErrors(raw, parseErrors),
        path: resolved.path,
        source: "file",
      };
    }

    const result = ChatBudgetConfigSchema.safeParse(parsed ?? {});
    if (!result.success) {
      const errors = result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      );
      return { success: false, errors, path: resolved.path, source: "file" };
    }

    return { success: true, config: result.data, path: resolved.path, source: "file" };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolved.path,
      source: "file",
    };
  }
}
